import express from "express";
import cors from "cors";
import { config } from "./config";
import { resolveScoringProfile } from "./config/scoringProfile";
import { createPersonasRouter } from "./routes/personas";
import { createLogger } from "./logger";
import { ScoringProfile } from "./types/persona";

export function createApp(profile: ScoringProfile) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/personas", createPersonasRouter(profile));

  return app;
}

if (require.main === module) {
  const logger = createLogger("server");
  const profile = resolveScoringProfile(config);
  const app = createApp(profile);

  app.listen(config.port, () => {
    logger.info(`Persona Scoring Service started`);
    logger.info(`Port: ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Scoring profile: ${config.scoringProfilePath ?? "built-in defaults"}`);
    logger.info(
      `Cuts: engagement ${profile.thresholds.engagement_cut}, risk ${profile.thresholds.risk_cut}`
    );
  });
}
