import type { Logger } from 'pino';
import type { ExtractionCascade } from '../extraction/cascade.js';
import type { DocumentRepository } from '../lib/document-repository.js';
import logger, { createDocumentLogger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import type { TaskQueue } from '../lib/task-queue.js';
import type { UploadStore } from '../lib/upload-store.js';
import type { JobDescription, MatchOptions } from '../schemas/match-schemas.js';
import type { EnrichmentRunner } from './enrichment.js';
import type { MatchingPipeline } from './matching.js';
import { transition } from './status.js';
import type { DocumentStatus, MatchJob, ResumeDocument } from './types.js';

export interface PipelineOrchestratorDeps {
  repository: DocumentRepository;
  queue: TaskQueue;
  uploads: UploadStore;
  cascade: ExtractionCascade;
  enrichment: EnrichmentRunner;
  matching: MatchingPipeline;
}

export interface UploadedFile {
  fileName: string;
  contentType: string;
  bytes: Buffer;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the document lifecycle. Each stage is its own queued task; finishing
 * one stage is what schedules the next.
 */
export class PipelineOrchestrator {
  /** Documents with an enrichment run in progress in this process. */
  private readonly enriching = new Set<string>();

  constructor(private readonly deps: PipelineOrchestratorDeps) {}

  // ─── Intake ──────────────────────────────────────────────────────────

  async submitDocument(file: UploadedFile): Promise<ResumeDocument> {
    const { repository, uploads, queue } = this.deps;
    let document = await repository.createDocument({
      fileName: file.fileName,
      fileSize: file.bytes.byteLength,
      contentType: file.contentType,
    });
    const log = createDocumentLogger(document.id, { fileName: file.fileName });

    try {
      const storagePath = await uploads.save(document.id, file.fileName, file.bytes);
      document = await repository.updateDocument(transition({ ...document, storagePath }, 'processing'));
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: failed to store upload');
      return this.markFailed(document, 'save_failed', log);
    }

    try {
      await queue.enqueue('extraction', document.id);
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: failed to schedule extraction');
      return this.markFailed(document, 'queue_failed', log);
    }

    log.info({ contentType: file.contentType, size: file.bytes.byteLength }, 'Pipeline: document accepted');
    return document;
  }

  // ─── Extraction ──────────────────────────────────────────────────────

  async runExtraction(documentId: string): Promise<void> {
    const log = createDocumentLogger(documentId, { stage: 'extraction' });
    const document = await this.deps.repository.getDocument(documentId);
    if (!document) {
      log.warn('Pipeline: extraction task for unknown document');
      return;
    }
    if (document.status !== 'processing') {
      log.warn({ status: document.status }, 'Pipeline: extraction task dropped, document not processing');
      return;
    }

    let text = '';
    try {
      if (!document.storagePath) throw new Error('Pipeline: document has no stored file');
      const bytes = await this.deps.uploads.read(document.storagePath);
      const result = await this.deps.cascade.extract(bytes, document.contentType, log);
      log.info({ method: result.method, chars: result.text.length }, 'Pipeline: extraction finished');
      text = result.text;
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: extraction faulted');
    }

    if (!text.trim()) {
      await this.markFailed(document, 'parse_failed', log);
      return;
    }

    let saved: ResumeDocument;
    try {
      saved = await this.deps.repository.updateDocument(transition(document, 'ai_processing', { rawText: text }));
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: failed to persist extracted text');
      await this.markFailed(document, 'save_failed', log);
      return;
    }

    try {
      await this.deps.queue.enqueue('enrichment', saved.id);
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: failed to schedule enrichment');
      await this.markFailed(saved, 'queue_failed', log);
    }
  }

  // ─── Enrichment ──────────────────────────────────────────────────────

  async runEnrichment(documentId: string): Promise<void> {
    const log = createDocumentLogger(documentId, { stage: 'enrichment' });
    if (this.enriching.has(documentId)) {
      log.warn('Pipeline: enrichment already running, duplicate task dropped');
      return;
    }
    this.enriching.add(documentId);
    try {
      await this.enrich(documentId, log);
    } finally {
      this.enriching.delete(documentId);
    }
  }

  private async enrich(documentId: string, log: Logger): Promise<void> {
    const document = await this.deps.repository.getDocument(documentId);
    if (!document) {
      log.warn('Pipeline: enrichment task for unknown document');
      return;
    }
    if (document.status !== 'ai_processing') {
      log.warn({ status: document.status }, 'Pipeline: enrichment task dropped, document not awaiting enrichment');
      return;
    }
    if (!document.rawText?.trim()) {
      await this.markFailed(document, 'parse_failed', log);
      return;
    }

    const outcome = await this.deps.enrichment.run(document.rawText, log);
    if (!outcome.ok) {
      await this.markFailed(document, 'ai_failed', log);
      return;
    }

    try {
      await this.deps.repository.updateDocument(
        transition(document, 'completed', {
          structuredData: outcome.structuredData,
          enrichment: outcome.enrichment,
        }),
      );
      log.info('Pipeline: document completed');
    } catch (err) {
      log.error({ error: describe(err) }, 'Pipeline: failed to persist enrichment');
      await this.markFailed(document, 'ai_failed', log);
    }
  }

  // ─── Matching ────────────────────────────────────────────────────────

  /**
   * Creates and schedules a match job. The caller has already checked that
   * the document is completed.
   */
  async submitMatch(documentId: string, requirements: JobDescription, options: MatchOptions): Promise<MatchJob> {
    const { repository, queue } = this.deps;
    const job = await repository.createMatchJob({ documentId, requirements, options });
    try {
      await queue.enqueue('matching', job.id);
    } catch (err) {
      const error = describe(err);
      logger.error({ matchId: job.id, documentId, error }, 'Pipeline: failed to schedule matching');
      await repository.updateMatchJob({
        ...job,
        status: 'failed',
        result: { error: `Scheduling failed: ${error}` },
        completedAt: new Date().toISOString(),
      });
      throw new Error(`Pipeline: could not schedule match ${job.id}: ${error}`);
    }
    return job;
  }

  async runMatching(matchId: string): Promise<void> {
    const { repository, matching } = this.deps;
    const job = await repository.getMatchJob(matchId);
    if (!job) {
      logger.warn({ matchId }, 'Pipeline: matching task for unknown match job');
      return;
    }
    if (job.status !== 'pending') {
      logger.warn({ matchId, status: job.status }, 'Pipeline: matching task dropped, job already finished');
      return;
    }

    const document = await repository.getDocument(job.documentId);
    if (!document || document.status !== 'completed' || !document.structuredData) {
      await repository.updateMatchJob({
        ...job,
        status: 'failed',
        result: { error: 'Resume is no longer available for matching' },
        completedAt: new Date().toISOString(),
      });
      return;
    }

    await matching.run(job, document);
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  /**
   * Writes a terminal failure status. If even that write fails, the error is
   * logged and reported and the in-memory copy is returned.
   */
  private async markFailed(
    document: ResumeDocument,
    status: Extract<DocumentStatus, 'parse_failed' | 'ai_failed' | 'save_failed' | 'queue_failed'>,
    log: Logger,
  ): Promise<ResumeDocument> {
    const failed = transition(document, status, { structuredData: null, enrichment: null });
    try {
      const saved = await this.deps.repository.updateDocument(failed);
      log.warn({ status }, 'Pipeline: document failed');
      return saved;
    } catch (err) {
      log.error({ status, error: describe(err) }, 'Pipeline: failed to persist failure status');
      captureError(err, { documentId: document.id, status });
      return failed;
    }
  }
}
