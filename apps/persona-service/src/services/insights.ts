import {
  LabeledCustomerRecord,
  LabeledRecordFilter,
  PersonaLabel,
  PersonaProfile,
  PERSONA_LABELS,
  PERSONA_COLORS,
  PERSONA_DISPLAY_NAMES,
} from "../types/persona";

export interface PersonaLegendEntry {
  persona: PersonaLabel;
  name: string;
  color: string;
}

/**
 * Display name and chart colour of every persona, in fixed label order
 */
export function personaLegend(): PersonaLegendEntry[] {
  return PERSONA_LABELS.map(persona => ({
    persona,
    name: PERSONA_DISPLAY_NAMES[persona],
    color: PERSONA_COLORS[persona],
  }));
}

/**
 * Average scores per persona, in fixed label order.
 * Personas with no records are left out.
 */
export function buildPersonaProfiles(records: readonly LabeledCustomerRecord[]): PersonaProfile[] {
  const sums = new Map<PersonaLabel, { count: number; engagement: number; persistence: number; exposure: number }>();

  for (const record of records) {
    const acc = sums.get(record.persona) ?? { count: 0, engagement: 0, persistence: 0, exposure: 0 };
    acc.count++;
    acc.engagement += record.engagement_score;
    acc.persistence += record.persistence_score;
    acc.exposure += record.financial_exposure;
    sums.set(record.persona, acc);
  }

  const profiles: PersonaProfile[] = [];
  for (const persona of PERSONA_LABELS) {
    const acc = sums.get(persona);
    if (!acc) continue;
    profiles.push({
      persona,
      count: acc.count,
      avg_engagement: acc.engagement / acc.count,
      avg_persistence: acc.persistence / acc.count,
      avg_financial_exposure: acc.exposure / acc.count,
    });
  }
  return profiles;
}

/**
 * Narrow a labeled batch the way the dashboard's sidebar does:
 * by persona and by an inclusive engagement range
 */
export function filterLabeledRecords(
  records: readonly LabeledCustomerRecord[],
  filter: LabeledRecordFilter = {}
): LabeledCustomerRecord[] {
  const personas = filter.personas ? new Set(filter.personas) : null;
  const range = filter.engagementRange;

  return records.filter(record => {
    if (personas && !personas.has(record.persona)) return false;
    if (range && (record.engagement_score < range.min || record.engagement_score > range.max)) {
      return false;
    }
    return true;
  });
}

/**
 * Lowest and highest engagement score in the batch (slider bounds)
 */
export function engagementExtent(
  records: readonly LabeledCustomerRecord[]
): { min: number; max: number } | null {
  if (records.length === 0) return null;

  let min = Infinity;
  let max = -Infinity;
  for (const record of records) {
    min = Math.min(min, record.engagement_score);
    max = Math.max(max, record.engagement_score);
  }
  return { min, max };
}
