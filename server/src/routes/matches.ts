import { Hono } from 'hono';
import type { DocumentRepository } from '../lib/document-repository.js';
import { isMatchFailure } from '../pipeline/types.js';

export function createMatchRoutes(repository: DocumentRepository) {
  const matches = new Hono();

  matches.get('/:id/status', async (c) => {
    const job = await repository.getMatchJob(c.req.param('id'));
    if (!job) return c.json({ error: 'Match not found' }, 404);
    return c.json({
      match_id: job.id,
      status: job.status,
      ...(job.status === 'failed' && isMatchFailure(job.result) ? { error: job.result.error } : {}),
    });
  });

  matches.get('/:id', async (c) => {
    const job = await repository.getMatchJob(c.req.param('id'));
    if (!job) return c.json({ error: 'Match not found' }, 404);
    if (job.status !== 'completed' || !job.result || isMatchFailure(job.result)) {
      return c.json({ error: `Match is not ready (status: ${job.status})`, status: job.status }, 409);
    }
    return c.json(job.result);
  });

  return matches;
}
