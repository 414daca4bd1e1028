import type {
  BiasReport,
  CareerProgression,
  CompensationEstimate,
  Enrichment,
  ParsedResume,
  ResumeAssessment,
} from '../schemas/resume-schemas.js';

/** Value each optional enrichment stage contributes, keyed by the field it owns. */
export interface OptionalStageValues {
  biasReport: BiasReport;
  anonymizedData: ParsedResume;
  compensationEstimate: CompensationEstimate;
  careerProgression: CareerProgression;
}

export type OptionalStageKey = keyof OptionalStageValues;

export type StageResult<K extends OptionalStageKey> =
  | { key: K; ok: true; value: OptionalStageValues[K] }
  | { key: K; ok: false; error: string };

export type AnyStageResult = { [K in OptionalStageKey]: StageResult<K> }[OptionalStageKey];

export function seedEnrichment(assessment: ResumeAssessment | null | undefined): Enrichment {
  return {
    qualityScore: assessment?.qualityScore ?? null,
    completenessScore: assessment?.completenessScore ?? null,
    suggestions: assessment?.suggestions ?? [],
    industryFit: assessment?.industryFit ?? {},
    biasReport: null,
    compensationEstimate: null,
    anonymizedData: null,
    careerProgression: null,
  };
}

function apply(record: Enrichment, result: AnyStageResult): Enrichment {
  switch (result.key) {
    case 'biasReport':
      return { ...record, biasReport: result.ok ? result.value : null };
    case 'anonymizedData':
      return { ...record, anonymizedData: result.ok ? result.value : null };
    case 'compensationEstimate':
      return { ...record, compensationEstimate: result.ok ? result.value : null };
    case 'careerProgression':
      return { ...record, careerProgression: result.ok ? result.value : null };
  }
}

/**
 * Folds stage results into the enrichment record in order. Each stage owns
 * exactly one key; a failed stage leaves its key null.
 */
export function mergeStageResults(base: Enrichment, results: readonly AnyStageResult[]): Enrichment {
  const seen = new Set<OptionalStageKey>();
  return results.reduce<Enrichment>((record, result) => {
    if (seen.has(result.key)) {
      throw new Error(`Enrichment: stage ${result.key} reported twice`);
    }
    seen.add(result.key);
    return apply(record, result);
  }, base);
}

/**
 * The record later stages work on: the anonymized copy when anonymization
 * succeeded, the structured data otherwise.
 */
export function selectEnrichmentInput(state: {
  structuredData: ParsedResume;
  anonymizedData: ParsedResume | null;
}): ParsedResume {
  return state.anonymizedData ?? state.structuredData;
}
