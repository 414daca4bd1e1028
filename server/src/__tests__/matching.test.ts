import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryDocumentRepository } from '../lib/document-repository.js';
import { MatchingPipeline, buildMatchingInput } from '../pipeline/matching.js';
import { seedEnrichment } from '../pipeline/stage-result.js';
import { isMatchFailure, type MatchJob, type ResumeDocument } from '../pipeline/types.js';
import { ParsedResumeSchema, ResumeAssessmentSchema } from '../schemas/resume-schemas.js';
import {
  JOB_DESCRIPTION,
  MATCH_OPTIONS,
  createTestInference,
  makeLLMResponse,
  makeMatchAnalysis,
  makeStructuredExtraction,
  userContent,
} from './helpers/fixtures.js';

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

describe('MatchingPipeline', () => {
  let repository: InMemoryDocumentRepository;
  let document: ResumeDocument;
  let job: MatchJob;

  beforeEach(async () => {
    repository = new InMemoryDocumentRepository();
    const created = await repository.createDocument({ fileName: 'resume.pdf', fileSize: 100, contentType: 'application/pdf' });
    const { assessment, ...parsed } = makeStructuredExtraction();
    document = await repository.updateDocument({
      ...created,
      status: 'completed',
      structuredData: ParsedResumeSchema.parse(parsed),
      enrichment: seedEnrichment(ResumeAssessmentSchema.parse(assessment)),
    });
    job = await repository.createMatchJob({ documentId: document.id, requirements: JOB_DESCRIPTION, options: MATCH_OPTIONS });
  });

  it('persists a completed job with identity and timing filled in', async () => {
    const { inference, chat } = createTestInference();
    chat.mockResolvedValueOnce(makeLLMResponse(makeMatchAnalysis()));
    const pipeline = new MatchingPipeline({ repository, inference, now: () => FIXED_NOW });

    const saved = await pipeline.run(job, document);

    expect(saved.status).toBe('completed');
    expect(saved.completedAt).toBe('2026-03-01T12:00:00.000Z');
    const result = saved.result;
    if (result === null || isMatchFailure(result)) throw new Error('expected a match result');
    expect(result.matchId).toBe(job.id);
    expect(result.resumeId).toBe(document.id);
    expect(result.jobTitle).toBe('Staff Backend Engineer');
    expect(result.company).toBe('Fabrikam');
    expect(result.matchingResults.overallScore).toBe(78);
    expect(result.matchingResults.categoryScores.skillsMatch.score).toBe(85);
    expect(result.explanation.summary).toBe('Strong backend fit with minor infrastructure gaps.');
    expect(result.metadata.matchedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(result.metadata.algorithm).toBe('llm-structured-match');
    expect(result.metadata.confidenceFactors).toBeNull();
    expect(result.metadata.processingTime).toBeGreaterThanOrEqual(0);

    expect((await repository.getMatchJob(job.id))?.status).toBe('completed');
  });

  it('keeps the algorithm name the model reports', async () => {
    const { inference, chat } = createTestInference();
    chat.mockResolvedValueOnce(
      makeLLMResponse({ ...makeMatchAnalysis(), metadata: { algorithm: 'weighted-v2', confidenceFactors: { skills: 0.9 } } }),
    );
    const pipeline = new MatchingPipeline({ repository, inference });

    const result = await pipeline.match(job, document);

    expect(result.metadata.algorithm).toBe('weighted-v2');
    expect(result.metadata.confidenceFactors).toEqual({ skills: 0.9 });
  });

  it('sends the resume, enrichment and requirements to the model', async () => {
    const { inference, chat } = createTestInference();
    chat.mockResolvedValueOnce(makeLLMResponse(makeMatchAnalysis()));
    const pipeline = new MatchingPipeline({ repository, inference });

    await pipeline.run(job, document);

    const sent: unknown = JSON.parse(userContent(chat, 0));
    expect(sent).toEqual(JSON.parse(JSON.stringify(buildMatchingInput(document, job))));
    expect(buildMatchingInput(document, job).resume.id).toBe(document.id);
    expect(buildMatchingInput(document, job).resume.aiEnhancements?.qualityScore).toBe(82);
  });

  it('persists a failed job without scores when the model output is invalid', async () => {
    const { inference, chat } = createTestInference();
    chat.mockResolvedValueOnce(makeLLMResponse({ explanation: { summary: 'no scores' } }));
    const pipeline = new MatchingPipeline({ repository, inference, now: () => FIXED_NOW });

    const saved = await pipeline.run(job, document);

    expect(saved.status).toBe('failed');
    expect(saved.completedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(isMatchFailure(saved.result)).toBe(true);
    expect(saved.result).not.toHaveProperty('matchingResults');
    expect((await repository.getMatchJob(job.id))?.status).toBe('failed');
  });

  it('persists a failed job when no provider is configured', async () => {
    const pipeline = new MatchingPipeline({ repository, inference: null });

    const saved = await pipeline.run(job, document);

    expect(saved.status).toBe('failed');
    expect(saved.result).toEqual({ error: 'Inference: service unavailable (no provider configured)' });
  });
});
