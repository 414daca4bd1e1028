import type { Logger } from 'pino';
import type { InferenceClient } from '../lib/inference.js';
import {
  BiasReportSchema,
  CareerProgressionSchema,
  CompensationEstimateSchema,
  ParsedResumeSchema,
  StructuredExtractionSchema,
  type Enrichment,
  type ParsedResume,
} from '../schemas/resume-schemas.js';
import {
  ANONYMIZATION_INSTRUCTIONS,
  BIAS_REVIEW_INSTRUCTIONS,
  CAREER_PROGRESSION_INSTRUCTIONS,
  COMPENSATION_INSTRUCTIONS,
  STRUCTURED_EXTRACTION_INSTRUCTIONS,
} from './prompts.js';
import {
  mergeStageResults,
  seedEnrichment,
  selectEnrichmentInput,
  type AnyStageResult,
  type OptionalStageKey,
  type OptionalStageValues,
  type StageResult,
} from './stage-result.js';

export type EnrichmentOutcome =
  | { ok: true; structuredData: ParsedResume; enrichment: Enrichment }
  | { ok: false; error: string };

async function runStage<K extends OptionalStageKey>(
  key: K,
  log: Logger,
  run: () => Promise<OptionalStageValues[K]>,
): Promise<StageResult<K>> {
  try {
    const value = await run();
    log.debug({ stage: key }, 'Enrichment: stage finished');
    return { key, ok: true, value };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    log.warn({ stage: key, error }, 'Enrichment: optional stage failed');
    return { key, ok: false, error };
  }
}

/**
 * Runs the five enrichment stages in order. Structured extraction is
 * mandatory; the other four are isolated so a failure only nulls their key.
 */
export class EnrichmentRunner {
  constructor(private readonly inference: InferenceClient | null) {}

  async run(rawText: string, log: Logger): Promise<EnrichmentOutcome> {
    const inference = this.inference;
    if (!inference) {
      return { ok: false, error: 'Inference: service unavailable (no provider configured)' };
    }

    // ─── 1. Structured extraction (mandatory) ─────────────────────────
    let structuredData: ParsedResume;
    let enrichment: Enrichment;
    try {
      const { assessment, ...parsed } = await inference.generate({
        task: 'structured_extraction',
        instructions: STRUCTURED_EXTRACTION_INSTRUCTIONS,
        input: rawText,
        schema: StructuredExtractionSchema,
      });
      structuredData = parsed;
      enrichment = seedEnrichment(assessment);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ stage: 'structured_extraction', error }, 'Enrichment: mandatory stage failed');
      return { ok: false, error };
    }

    const results: AnyStageResult[] = [];

    // ─── 2. Bias review ───────────────────────────────────────────────
    results.push(
      await runStage('biasReport', log, () =>
        inference.generate({
          task: 'bias_review',
          instructions: BIAS_REVIEW_INSTRUCTIONS,
          input: rawText,
          schema: BiasReportSchema,
        }),
      ),
    );

    // ─── 3. Anonymization ─────────────────────────────────────────────
    const anonymized = await runStage('anonymizedData', log, () =>
      inference.generate({
        task: 'anonymization',
        instructions: ANONYMIZATION_INSTRUCTIONS,
        input: structuredData,
        schema: ParsedResumeSchema,
      }),
    );
    results.push(anonymized);

    // ─── 4–5. Stages on the preferred input ───────────────────────────
    const stageInput = selectEnrichmentInput({
      structuredData,
      anonymizedData: anonymized.ok ? anonymized.value : null,
    });

    results.push(
      await runStage('compensationEstimate', log, () =>
        inference.generate({
          task: 'compensation_estimate',
          instructions: COMPENSATION_INSTRUCTIONS,
          input: stageInput,
          schema: CompensationEstimateSchema,
        }),
      ),
    );

    results.push(
      await runStage('careerProgression', log, () =>
        inference.generate({
          task: 'career_progression',
          instructions: CAREER_PROGRESSION_INSTRUCTIONS,
          input: stageInput,
          schema: CareerProgressionSchema,
        }),
      ),
    );

    const failed = results.filter((result) => !result.ok).map((result) => result.key);
    log.info({ failedStages: failed }, 'Enrichment: run finished');

    return { ok: true, structuredData, enrichment: mergeStageResults(enrichment, results) };
  }
}
