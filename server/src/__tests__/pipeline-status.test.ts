import { describe, it, expect } from 'vitest';
import { ALLOWED_TRANSITIONS, assertTransition, canTransition, isTerminal, transition } from '../pipeline/status.js';
import { DOCUMENT_STATUSES, type ResumeDocument } from '../pipeline/types.js';

function makeDocument(overrides: Partial<ResumeDocument> = {}): ResumeDocument {
  return {
    id: 'doc-1',
    fileName: 'resume.txt',
    fileSize: 10,
    contentType: 'text/plain',
    storagePath: 'mem://doc-1/resume.txt',
    status: 'processing',
    rawText: null,
    structuredData: null,
    enrichment: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    ...overrides,
  };
}

describe('status transitions', () => {
  it('covers every status', () => {
    expect(Object.keys(ALLOWED_TRANSITIONS).sort()).toEqual([...DOCUMENT_STATUSES].sort());
  });

  it('allows the pipeline path', () => {
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('processing', 'ai_processing')).toBe(true);
    expect(canTransition('ai_processing', 'completed')).toBe(true);
  });

  it('allows each failure exit', () => {
    expect(canTransition('pending', 'save_failed')).toBe(true);
    expect(canTransition('processing', 'queue_failed')).toBe(true);
    expect(canTransition('processing', 'parse_failed')).toBe(true);
    expect(canTransition('processing', 'save_failed')).toBe(true);
    expect(canTransition('ai_processing', 'ai_failed')).toBe(true);
  });

  it('rejects skipping stages', () => {
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('pending', 'queue_failed')).toBe(false);
    expect(canTransition('processing', 'completed')).toBe(false);
    expect(() => assertTransition('processing', 'ai_failed')).toThrow(
      'Pipeline: illegal status transition processing -> ai_failed',
    );
  });

  it('lets no automatic stage leave a terminal state', () => {
    for (const status of DOCUMENT_STATUSES.filter(isTerminal)) {
      expect(ALLOWED_TRANSITIONS[status].filter((next) => next !== 'completed')).toEqual([]);
    }
  });

  it('classifies terminal statuses', () => {
    expect(DOCUMENT_STATUSES.filter(isTerminal)).toEqual([
      'completed',
      'parse_failed',
      'ai_failed',
      'save_failed',
      'queue_failed',
    ]);
  });
});

describe('transition', () => {
  const now = new Date('2026-02-03T04:05:06.000Z');

  it('stamps completedAt on terminal statuses', () => {
    const next = transition(makeDocument({ status: 'ai_processing', rawText: 'text' }), 'ai_failed', {}, now);
    expect(next.status).toBe('ai_failed');
    expect(next.completedAt).toBe('2026-02-03T04:05:06.000Z');
  });

  it('keeps completedAt on intermediate statuses', () => {
    const next = transition(makeDocument(), 'ai_processing', { rawText: 'hello' }, now);
    expect(next.completedAt).toBeNull();
    expect(next.rawText).toBe('hello');
  });

  it('does not mutate its input', () => {
    const document = makeDocument();
    transition(document, 'parse_failed', {}, now);
    expect(document.status).toBe('processing');
  });

  it('throws on an illegal move', () => {
    expect(() => transition(makeDocument({ status: 'queue_failed' }), 'completed', {}, now)).toThrow(
      'Pipeline: illegal status transition queue_failed -> completed',
    );
  });
});
