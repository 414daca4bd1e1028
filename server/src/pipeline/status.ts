import { TERMINAL_STATUSES, type DocumentStatus, type ResumeDocument } from './types.js';

/**
 * Every status write a pipeline may perform. Terminal states only leave
 * through a manual edit, which lands on `completed`.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<DocumentStatus, readonly DocumentStatus[]>> = {
  pending: ['processing', 'save_failed'],
  processing: ['ai_processing', 'parse_failed', 'save_failed', 'queue_failed'],
  // queue_failed: the enrichment run could not be scheduled.
  // parse_failed: a document reached enrichment without text.
  ai_processing: ['completed', 'ai_failed', 'parse_failed', 'queue_failed'],
  completed: ['completed'],
  parse_failed: ['completed'],
  ai_failed: ['completed'],
  save_failed: [],
  queue_failed: [],
};

export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: DocumentStatus, to: DocumentStatus): void {
  if (!canTransition(from, to)) {
    throw new Error(`Pipeline: illegal status transition ${from} -> ${to}`);
  }
}

export function isTerminal(status: DocumentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Returns a copy of the document moved to `status`. Terminal transitions
 * stamp `completedAt`.
 */
export function transition(
  document: ResumeDocument,
  status: DocumentStatus,
  changes: Partial<Pick<ResumeDocument, 'rawText' | 'structuredData' | 'enrichment'>> = {},
  now: Date = new Date(),
): ResumeDocument {
  assertTransition(document.status, status);
  return {
    ...document,
    ...changes,
    status,
    completedAt: isTerminal(status) ? now.toISOString() : document.completedAt,
  };
}
