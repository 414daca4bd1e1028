import { performance } from 'node:perf_hooks';
import type { DocumentRepository } from '../lib/document-repository.js';
import type { InferenceClient } from '../lib/inference.js';
import { createMatchLogger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import {
  MatchAnalysisSchema,
  MatchResultSchema,
  type MatchResult,
} from '../schemas/match-schemas.js';
import { MATCH_INSTRUCTIONS } from './prompts.js';
import type { MatchJob, ResumeDocument } from './types.js';

const DEFAULT_ALGORITHM = 'llm-structured-match';

export interface MatchingPipelineDeps {
  repository: DocumentRepository;
  inference: InferenceClient | null;
  now?: () => Date;
}

/**
 * The document's structured view combined with the requirements and options.
 */
export function buildMatchingInput(document: ResumeDocument, job: MatchJob) {
  return {
    resume: {
      id: document.id,
      ...document.structuredData,
      aiEnhancements: document.enrichment,
    },
    jobDescription: job.requirements,
    options: job.options,
  };
}

/**
 * Scores one completed document against one job description. The caller
 * checks that the document is completed; everything after acceptance ends
 * in a persisted `completed` or `failed` job.
 */
export class MatchingPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: MatchingPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(job: MatchJob, document: ResumeDocument): Promise<MatchJob> {
    const log = createMatchLogger(job.id, { documentId: document.id });

    let result: MatchResult;
    try {
      result = await this.match(job, document);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.warn({ error }, 'Matching: failed');
      return this.persistFailure(job, error);
    }

    try {
      const saved = await this.deps.repository.updateMatchJob({
        ...job,
        status: 'completed',
        result,
        completedAt: this.now().toISOString(),
      });
      log.info(
        { overallScore: result.matchingResults.overallScore, processingTime: result.metadata.processingTime },
        'Matching: completed',
      );
      return saved;
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ error }, 'Matching: failed to persist result');
      return this.persistFailure(job, error);
    }
  }

  async match(job: MatchJob, document: ResumeDocument): Promise<MatchResult> {
    const inference = this.deps.inference;
    if (!inference) {
      throw new Error('Inference: service unavailable (no provider configured)');
    }

    const started = performance.now();
    const analysis = await inference.generate({
      task: 'match',
      instructions: MATCH_INSTRUCTIONS,
      input: buildMatchingInput(document, job),
      schema: MatchAnalysisSchema,
    });
    const processingTime = Math.max(0, (performance.now() - started) / 1000);

    return MatchResultSchema.parse({
      matchId: job.id,
      resumeId: document.id,
      jobTitle: job.requirements.title,
      company: job.requirements.company ?? null,
      matchingResults: analysis.matchingResults,
      explanation: analysis.explanation,
      metadata: {
        matchedAt: this.now().toISOString(),
        processingTime,
        algorithm: analysis.metadata?.algorithm ?? DEFAULT_ALGORITHM,
        confidenceFactors: analysis.metadata?.confidenceFactors ?? null,
      },
    });
  }

  private async persistFailure(job: MatchJob, error: string): Promise<MatchJob> {
    const failed: MatchJob = {
      ...job,
      status: 'failed',
      result: { error },
      completedAt: this.now().toISOString(),
    };
    try {
      return await this.deps.repository.updateMatchJob(failed);
    } catch (err) {
      createMatchLogger(job.id).error(
        { error: err instanceof Error ? err.message : String(err) },
        'Matching: failed to persist failure status',
      );
      captureError(err, { matchId: job.id });
      return failed;
    }
  }
}
