import { Hono } from 'hono';
import type { DocumentRepository } from '../lib/document-repository.js';
import { parseJsonBodyWithLimit, rejectOversizedBody } from '../lib/http-body-guard.js';
import logger from '../lib/logger.js';
import type { UploadStore } from '../lib/upload-store.js';
import { summarizeIssues, validateBody } from '../lib/validate.js';
import type { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import { canTransition, transition } from '../pipeline/status.js';
import { MatchRequestSchema } from '../schemas/match-schemas.js';
import { ManualResumeUpdateSchema } from '../schemas/resume-schemas.js';
import { serializeMatchJob, serializeResume, serializeResumeSummary } from './serializers.js';

const MAX_JSON_BODY_BYTES = 1_000_000;
// Multipart framing on top of the file itself.
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

export interface ResumeRouteDeps {
  repository: DocumentRepository;
  orchestrator: PipelineOrchestrator;
  uploads: UploadStore;
  maxUploadBytes: number;
}

export function createResumeRoutes(deps: ResumeRouteDeps) {
  const { repository, orchestrator, uploads, maxUploadBytes } = deps;
  const resumes = new Hono();

  // POST /resumes/upload: multipart `file`
  resumes.post('/upload', async (c) => {
    const oversized = rejectOversizedBody(c, maxUploadBytes + MULTIPART_OVERHEAD_BYTES);
    if (oversized) return oversized;

    const body = await c.req.parseBody();
    const file = body['file'];
    if (!(file instanceof File)) {
      return c.json({ error: 'Multipart field "file" is required' }, 400);
    }
    if (file.size > maxUploadBytes) {
      return c.json({ error: `File too large (max ${maxUploadBytes} bytes)` }, 413);
    }
    if (file.size === 0) {
      return c.json({ error: 'Uploaded file is empty' }, 400);
    }

    const document = await orchestrator.submitDocument({
      fileName: file.name || 'upload',
      contentType: file.type || 'application/octet-stream',
      bytes: Buffer.from(await file.arrayBuffer()),
    });

    if (document.status === 'save_failed') {
      return c.json({ error: 'Failed to store uploaded file', id: document.id, status: document.status }, 500);
    }
    if (document.status === 'queue_failed') {
      return c.json({ error: 'Failed to schedule processing', id: document.id, status: document.status }, 500);
    }
    return c.json(serializeResumeSummary(document));
  });

  // GET /resumes/:id/status
  resumes.get('/:id/status', async (c) => {
    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    return c.json({ id: document.id, status: document.status });
  });

  // GET /resumes/:id (completed documents only)
  resumes.get('/:id', async (c) => {
    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    if (document.status !== 'completed') {
      return c.json({ error: `Resume is not ready (status: ${document.status})`, status: document.status }, 409);
    }
    return c.json(serializeResume(document));
  });

  // PUT /resumes/:id: manual overwrite of structured data and enrichment
  resumes.put('/:id', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const validated = validateBody(ManualResumeUpdateSchema, parsedBody.data);
    if (!validated.success) {
      return c.json({ error: 'Invalid resume data', details: summarizeIssues(validated.issues) }, 400);
    }

    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    if (!canTransition(document.status, 'completed')) {
      return c.json({ error: `Resume cannot be edited while ${document.status}`, status: document.status }, 409);
    }

    const { aiEnhancements, ...structuredData } = validated.data;
    const updated = await repository.updateDocument(
      transition(document, 'completed', {
        structuredData,
        enrichment: aiEnhancements ?? document.enrichment,
      }),
    );
    logger.info({ documentId: updated.id }, 'Resume manually updated');
    return c.json(serializeResume(updated));
  });

  // DELETE /resumes/:id: record, match jobs and stored file
  resumes.delete('/:id', async (c) => {
    const id = c.req.param('id');
    const document = await repository.getDocument(id);
    if (!document) return c.json({ error: 'Resume not found' }, 404);

    if (document.storagePath) {
      try {
        await uploads.remove(document.storagePath);
      } catch (err) {
        logger.warn(
          { documentId: id, error: err instanceof Error ? err.message : String(err) },
          'Failed to remove stored upload',
        );
      }
    }
    await repository.deleteDocument(id);
    return c.json({ id, deleted: true });
  });

  // POST /resumes/:id/match
  resumes.post('/:id/match', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const validated = validateBody(MatchRequestSchema, parsedBody.data);
    if (!validated.success) {
      return c.json({ error: 'Invalid match request', details: summarizeIssues(validated.issues) }, 400);
    }

    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    if (document.status !== 'completed' || !document.structuredData) {
      return c.json({ error: `Resume is not ready for matching (status: ${document.status})`, status: document.status }, 409);
    }

    const job = await orchestrator.submitMatch(document.id, validated.data.jobDescription, validated.data.options);
    return c.json(serializeMatchJob(job), 202);
  });

  // GET /resumes/:id/matches
  resumes.get('/:id/matches', async (c) => {
    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    const jobs = await repository.listMatchJobs(document.id);
    return c.json({ matches: jobs.map((job) => ({ ...serializeMatchJob(job), completed_at: job.completedAt })) });
  });

  return resumes;
}
