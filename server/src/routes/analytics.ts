import { Hono } from 'hono';
import type { DocumentRepository } from '../lib/document-repository.js';

export function createAnalyticsRoutes(repository: DocumentRepository) {
  const analytics = new Hono();

  analytics.get('/resume/:id', async (c) => {
    const document = await repository.getDocument(c.req.param('id'));
    if (!document) return c.json({ error: 'Resume not found' }, 404);
    if (document.status !== 'completed') {
      return c.json({ error: `Resume is not ready (status: ${document.status})`, status: document.status }, 409);
    }
    return c.json({
      id: document.id,
      status: document.status,
      ai_enhancements: document.enrichment,
    });
  });

  return analytics;
}
