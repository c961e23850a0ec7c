import { buildPersonaResponse } from "../personas";
import { DEFAULT_THRESHOLDS } from "../../services/classifier";
import { ConfigError } from "../../errors";
import { ScoringConfig } from "../../types/persona";

describe("Persona batch response", () => {
  const scoring: ScoringConfig = {
    weights: {
      engagement: { visits: 1 },
      persistence: { tenure: 1 },
      financial: { utilization: 1 },
    },
    bounds: {
      visits: { min: 0, max: 10 },
      tenure: { min: 0, max: 10 },
      utilization: { min: 0, max: 1 },
    },
  };

  const records = [
    { id: "a", signals: { visits: 8, tenure: 4, utilization: 0.2 } },
    { id: "b", signals: { visits: 2, tenure: 6, utilization: 0.9 } },
    { id: "c", signals: { visits: 3, tenure: 2, utilization: 0.1 } },
    { id: "bad", signals: { visits: "n/a" } },
  ];

  it("should return labeled records, KPIs, profiles and skipped rows", () => {
    const response = buildPersonaResponse(records, scoring, DEFAULT_THRESHOLDS);

    expect(response.records.map(r => [r.id, r.persona])).toEqual([
      ["a", "HighlyEngagedLoyalist"],
      ["b", "FinanciallyStressedRepeater"],
      ["c", "CuriousSafeExplorer"],
    ]);
    expect(response.summary.total).toBe(3);
    expect(response.summary.active_personas).toBe(3);
    expect(response.profiles).toHaveLength(3);
    expect(response.errors.map(e => e.record_id)).toEqual(["bad"]);
    expect(response.engagement_extent).toEqual({ min: 0.2, max: 0.8 });
  });

  it("should compute KPIs over the filtered records but keep the full extent", () => {
    const response = buildPersonaResponse(records, scoring, DEFAULT_THRESHOLDS, {
      personas: ["FinanciallyStressedRepeater", "CuriousSafeExplorer"],
    });

    expect(response.records.map(r => r.id)).toEqual(["b", "c"]);
    expect(response.summary.total).toBe(2);
    expect(response.summary.at_risk).toEqual({ count: 1, percentage: 0.5 });
    expect(response.summary.high_engagement).toEqual({ count: 0, percentage: 0 });
    expect(response.engagement_extent).toEqual({ min: 0.2, max: 0.8 });
  });

  it("should surface invalid weights as a ConfigError", () => {
    const invalid: ScoringConfig = {
      ...scoring,
      weights: { ...scoring.weights, financial: { utilization: 0.5 } },
    };

    expect(() => buildPersonaResponse(records, invalid, DEFAULT_THRESHOLDS)).toThrow(ConfigError);
  });
});
