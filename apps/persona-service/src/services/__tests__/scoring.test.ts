import {
  calculateScores,
  normalizeSignal,
  validateScoringConfig,
  MISSING_SIGNAL_VALUE,
} from "../scoring";
import { ConfigError, ValidationError } from "../../errors";
import { RawCustomerRecord, ScoringConfig } from "../../types/persona";
import { SeededRandom } from "./seededRandom";

describe("Score Calculator", () => {
  const config: ScoringConfig = {
    weights: {
      engagement: { visits: 0.5, sessions: 0.5 },
      persistence: { tenure: 1 },
      financial: { balance: 0.25, utilization: 0.75 },
    },
    bounds: {
      visits: { min: 0, max: 10 },
      sessions: { min: 0, max: 20 },
      tenure: { min: 0, max: 60 },
      balance: { min: 0, max: 1000 },
      utilization: { min: 0, max: 1 },
    },
  };

  const fullRecord: RawCustomerRecord = {
    id: "cust-1",
    signals: { visits: 5, sessions: 20, tenure: 30, balance: 100, utilization: 0.2 },
  };

  describe("calculateScores", () => {
    it("should combine normalized signals with their weights", () => {
      const result = calculateScores(fullRecord, config);

      expect(result.engagement_score).toBeCloseTo(0.75, 10);
      expect(result.persistence_score).toBeCloseTo(0.5, 10);
      expect(result.financial_exposure).toBeCloseTo(0.175, 10);
      expect(result.imputed_signals).toEqual([]);
    });

    it("should keep the id and signals of the input record", () => {
      const result = calculateScores(fullRecord, config);

      expect(result.id).toBe("cust-1");
      expect(result.signals).toEqual(fullRecord.signals);
      expect(result.signals).not.toBe(fullRecord.signals);
    });

    it("should score missing signals at the neutral midpoint", () => {
      const result = calculateScores({ id: "empty", signals: {} }, config);

      expect(result.engagement_score).toBe(MISSING_SIGNAL_VALUE);
      expect(result.persistence_score).toBe(MISSING_SIGNAL_VALUE);
      expect(result.financial_exposure).toBe(MISSING_SIGNAL_VALUE);
      expect(result.imputed_signals).toEqual(["balance", "sessions", "tenure", "utilization", "visits"]);
    });

    it("should treat null and NaN as missing", () => {
      const result = calculateScores(
        { id: "gaps", signals: { ...fullRecord.signals, visits: null, sessions: NaN } },
        config
      );

      expect(result.engagement_score).toBe(0.5);
      expect(result.imputed_signals).toEqual(["sessions", "visits"]);
    });

    it("should clamp values outside the expected bounds", () => {
      const result = calculateScores(
        { id: "outlier", signals: { ...fullRecord.signals, visits: 50, sessions: -5 } },
        config
      );

      // visits clamps to 1, sessions clamps to 0
      expect(result.engagement_score).toBe(0.5);
    });

    it("should ignore signals that carry no weight", () => {
      const result = calculateScores(
        { id: "extra", signals: { ...fullRecord.signals, notes: "called twice" } },
        config
      );

      expect(result.engagement_score).toBeCloseTo(0.75, 10);
    });

    it("should not depend on the order of signals in the record", () => {
      const reordered: RawCustomerRecord = {
        id: "cust-1",
        signals: { utilization: 0.2, balance: 100, tenure: 30, sessions: 20, visits: 5 },
      };

      const a = calculateScores(fullRecord, config);
      const b = calculateScores(reordered, config);

      expect(b.engagement_score).toBe(a.engagement_score);
      expect(b.persistence_score).toBe(a.persistence_score);
      expect(b.financial_exposure).toBe(a.financial_exposure);
    });

    it("should return the same result on repeated calls", () => {
      expect(calculateScores(fullRecord, config)).toEqual(calculateScores(fullRecord, config));
    });

    it("should reject a non-numeric value on a weighted signal", () => {
      const record: RawCustomerRecord = {
        id: "bad",
        signals: { ...fullRecord.signals, visits: "lots" },
      };

      expect(() => calculateScores(record, config)).toThrow(ValidationError);

      try {
        calculateScores(record, config);
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.recordId).toBe("bad");
          expect(error.field).toBe("visits");
          expect(error.message).toBe('Signal "visits" must be numeric, got string "lots"');
        }
      }
    });

    it("should fail with ConfigError when engagement weights do not sum to 1", () => {
      const badConfig: ScoringConfig = {
        ...config,
        weights: { ...config.weights, engagement: { visits: 0.3, sessions: 0.3 } },
      };

      expect(() => calculateScores(fullRecord, badConfig)).toThrow(ConfigError);
    });

    it("should keep every score within [0, 1] for random signals and weights", () => {
      const rng = new SeededRandom(20240611);
      const signalNames = ["a", "b", "c", "d"];

      for (let i = 0; i < 500; i++) {
        const randomWeights = () => {
          const raw = signalNames.map(() => rng.float(0, 1) + 0.001);
          const sum = raw.reduce((s, w) => s + w, 0);
          return Object.fromEntries(signalNames.map((name, j) => [name, raw[j] / sum]));
        };
        const randomConfig: ScoringConfig = {
          weights: {
            engagement: randomWeights(),
            persistence: randomWeights(),
            financial: randomWeights(),
          },
          bounds: Object.fromEntries(
            signalNames.map(name => [name, { min: 0, max: 100, invert: rng.chance(0.3) }])
          ),
        };
        const signals = Object.fromEntries(
          signalNames.map(name => [name, rng.chance(0.2) ? null : rng.float(-500, 500)])
        );

        const result = calculateScores({ id: `r${i}`, signals }, randomConfig);

        for (const score of [result.engagement_score, result.persistence_score, result.financial_exposure]) {
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      }
    });
  });

  describe("normalizeSignal", () => {
    it("should min-max scale into [0, 1]", () => {
      expect(normalizeSignal(25, { min: 0, max: 100 })).toBe(0.25);
      expect(normalizeSignal(-10, { min: 0, max: 100 })).toBe(0);
      expect(normalizeSignal(150, { min: 0, max: 100 })).toBe(1);
    });

    it("should flip inverted signals", () => {
      expect(normalizeSignal(2, { min: 0, max: 10, invert: true })).toBeCloseTo(0.8, 10);
    });
  });

  describe("validateScoringConfig", () => {
    it("should accept a valid config", () => {
      expect(validateScoringConfig(config)).toEqual([]);
    });

    it("should report a weight sum away from 1", () => {
      const issues = validateScoringConfig({
        ...config,
        weights: { ...config.weights, engagement: { visits: 0.3, sessions: 0.3 } },
      });

      expect(issues).toEqual(["engagement: weights sum to 0.6, expected 1.0"]);
    });

    it("should accept a sum within the tolerance", () => {
      const issues = validateScoringConfig({
        ...config,
        weights: { ...config.weights, engagement: { visits: 0.5, sessions: 0.5000004 } },
      });

      expect(issues).toEqual([]);
    });

    it("should report negative weights", () => {
      const issues = validateScoringConfig({
        ...config,
        weights: { ...config.weights, engagement: { visits: 1.5, sessions: -0.5 } },
      });

      expect(issues).toEqual(["engagement.sessions: negative weight -0.5"]);
    });

    it("should report weighted signals without usable bounds", () => {
      const issues = validateScoringConfig({
        weights: config.weights,
        bounds: {
          visits: { min: 0, max: 10 },
          sessions: { min: 0, max: 20 },
          tenure: { min: 5, max: 5 },
          utilization: { min: 0, max: 1 },
        },
      });

      expect(issues).toEqual(["tenure: bounds min must be below max", "balance: missing bounds"]);
    });

    it("should report an empty category", () => {
      const issues = validateScoringConfig({
        ...config,
        weights: { ...config.weights, persistence: {} },
      });

      expect(issues).toEqual(["persistence: no weighted signals"]);
    });
  });
});
