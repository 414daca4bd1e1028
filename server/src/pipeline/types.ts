import type { Enrichment, ParsedResume } from '../schemas/resume-schemas.js';
import type { JobDescription, MatchFailure, MatchOptions, MatchResult } from '../schemas/match-schemas.js';

// ─── Document lifecycle ───────────────────────────────────────────────

export const DOCUMENT_STATUSES = [
  'pending',
  'processing',
  'ai_processing',
  'completed',
  'parse_failed',
  'ai_failed',
  'save_failed',
  'queue_failed',
] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<DocumentStatus> = new Set<DocumentStatus>([
  'completed',
  'parse_failed',
  'ai_failed',
  'save_failed',
  'queue_failed',
]);

export interface ResumeDocument {
  id: string;
  fileName: string;
  fileSize: number;
  contentType: string;
  storagePath: string | null;
  status: DocumentStatus;
  rawText: string | null;
  structuredData: ParsedResume | null;
  enrichment: Enrichment | null;
  createdAt: string;
  completedAt: string | null;
}

export type NewDocument = Pick<ResumeDocument, 'fileName' | 'fileSize' | 'contentType'>;

// ─── Match jobs ───────────────────────────────────────────────────────

export const MATCH_STATUSES = ['pending', 'completed', 'failed'] as const;

export type MatchStatus = (typeof MATCH_STATUSES)[number];

export interface MatchJob {
  id: string;
  documentId: string;
  requirements: JobDescription;
  options: MatchOptions;
  status: MatchStatus;
  /** The validated result when completed, `{ error }` when failed. */
  result: MatchResult | MatchFailure | null;
  createdAt: string;
  completedAt: string | null;
}

export type NewMatchJob = Pick<MatchJob, 'documentId' | 'requirements' | 'options'>;

export function isMatchFailure(result: MatchJob['result']): result is MatchFailure {
  return result !== null && 'error' in result;
}
