/**
 * Document Repository (Supabase): `resumes` and `job_matches` tables.
 *
 * Rows use snake_case columns; they are validated with zod on the way out so
 * a drifted column never reaches a pipeline as an unchecked value.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { EnrichmentSchema, ParsedResumeSchema } from '../schemas/resume-schemas.js';
import {
  JobDescriptionSchema,
  MatchFailureSchema,
  MatchOptionsSchema,
  MatchResultSchema,
} from '../schemas/match-schemas.js';
import {
  DOCUMENT_STATUSES,
  MATCH_STATUSES,
  type MatchJob,
  type NewDocument,
  type NewMatchJob,
  type ResumeDocument,
} from '../pipeline/types.js';
import type { DocumentRepository } from './document-repository.js';

const RESUMES_TABLE = 'resumes';
const MATCHES_TABLE = 'job_matches';

// ─── Row shapes ───────────────────────────────────────────────────────

const ResumeRowSchema = z.object({
  id: z.string(),
  file_name: z.string(),
  file_size: z.number(),
  file_type: z.string(),
  storage_path: z.string().nullable(),
  processing_status: z.enum(DOCUMENT_STATUSES),
  raw_text: z.string().nullable(),
  structured_data: ParsedResumeSchema.nullable(),
  ai_enhancements: EnrichmentSchema.nullable(),
  uploaded_at: z.string(),
  processed_at: z.string().nullable(),
});

type ResumeRow = z.infer<typeof ResumeRowSchema>;

const MatchRowSchema = z.object({
  id: z.string(),
  resume_id: z.string(),
  job_description: JobDescriptionSchema,
  match_options: MatchOptionsSchema,
  status: z.enum(MATCH_STATUSES),
  match_result: z.union([MatchResultSchema, MatchFailureSchema]).nullable(),
  created_at: z.string(),
  completed_at: z.string().nullable(),
});

type MatchRow = z.infer<typeof MatchRowSchema>;

export function toResumeRow(document: ResumeDocument): ResumeRow {
  return {
    id: document.id,
    file_name: document.fileName,
    file_size: document.fileSize,
    file_type: document.contentType,
    storage_path: document.storagePath,
    processing_status: document.status,
    raw_text: document.rawText,
    structured_data: document.structuredData,
    ai_enhancements: document.enrichment,
    uploaded_at: document.createdAt,
    processed_at: document.completedAt,
  };
}

export function fromResumeRow(raw: unknown): ResumeDocument {
  const row = ResumeRowSchema.parse(raw);
  return {
    id: row.id,
    fileName: row.file_name,
    fileSize: row.file_size,
    contentType: row.file_type,
    storagePath: row.storage_path,
    status: row.processing_status,
    rawText: row.raw_text,
    structuredData: row.structured_data,
    enrichment: row.ai_enhancements,
    createdAt: row.uploaded_at,
    completedAt: row.processed_at,
  };
}

export function toMatchRow(job: MatchJob): MatchRow {
  return {
    id: job.id,
    resume_id: job.documentId,
    job_description: job.requirements,
    match_options: job.options,
    status: job.status,
    match_result: job.result,
    created_at: job.createdAt,
    completed_at: job.completedAt,
  };
}

export function fromMatchRow(raw: unknown): MatchJob {
  const row = MatchRowSchema.parse(raw);
  return {
    id: row.id,
    documentId: row.resume_id,
    requirements: row.job_description,
    options: row.match_options,
    status: row.status,
    result: row.match_result,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

// ─── Repository ───────────────────────────────────────────────────────

export class SupabaseDocumentRepository implements DocumentRepository {
  readonly name = 'supabase';

  constructor(private readonly client: SupabaseClient) {}

  async createDocument(input: NewDocument): Promise<ResumeDocument> {
    const { data, error } = await this.client
      .from(RESUMES_TABLE)
      .insert({
        file_name: input.fileName,
        file_size: input.fileSize,
        file_type: input.contentType,
        processing_status: 'pending',
      })
      .select('*')
      .single();

    if (error || !data) {
      throw new Error(`DocumentRepository: failed to create document: ${error?.message ?? 'no row returned'}`);
    }
    return fromResumeRow(data);
  }

  async getDocument(id: string): Promise<ResumeDocument | null> {
    const { data, error } = await this.client
      .from(RESUMES_TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new Error(`DocumentRepository: failed to load document ${id}: ${error.message}`);
    }
    return data ? fromResumeRow(data) : null;
  }

  async updateDocument(document: ResumeDocument): Promise<ResumeDocument> {
    const { id, ...row } = toResumeRow(document);
    const { data, error } = await this.client
      .from(RESUMES_TABLE)
      .update(row)
      .eq('id', id)
      .select('*')
      .single();

    if (error || !data) {
      throw new Error(`DocumentRepository: failed to update document ${id}: ${error?.message ?? 'not found'}`);
    }
    return fromResumeRow(data);
  }

  async deleteDocument(id: string): Promise<boolean> {
    const { error: matchError } = await this.client
      .from(MATCHES_TABLE)
      .delete()
      .eq('resume_id', id);
    if (matchError) {
      throw new Error(`DocumentRepository: failed to delete matches for ${id}: ${matchError.message}`);
    }

    const { data, error } = await this.client
      .from(RESUMES_TABLE)
      .delete()
      .eq('id', id)
      .select('id');

    if (error) {
      throw new Error(`DocumentRepository: failed to delete document ${id}: ${error.message}`);
    }
    return Array.isArray(data) && data.length > 0;
  }

  async createMatchJob(input: NewMatchJob): Promise<MatchJob> {
    const { data, error } = await this.client
      .from(MATCHES_TABLE)
      .insert({
        resume_id: input.documentId,
        job_description: input.requirements,
        match_options: input.options,
        status: 'pending',
      })
      .select('*')
      .single();

    if (error || !data) {
      throw new Error(`DocumentRepository: failed to create match job: ${error?.message ?? 'no row returned'}`);
    }
    return fromMatchRow(data);
  }

  async getMatchJob(id: string): Promise<MatchJob | null> {
    const { data, error } = await this.client
      .from(MATCHES_TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new Error(`DocumentRepository: failed to load match job ${id}: ${error.message}`);
    }
    return data ? fromMatchRow(data) : null;
  }

  async updateMatchJob(job: MatchJob): Promise<MatchJob> {
    const { id, ...row } = toMatchRow(job);
    const { data, error } = await this.client
      .from(MATCHES_TABLE)
      .update(row)
      .eq('id', id)
      .select('*')
      .single();

    if (error || !data) {
      throw new Error(`DocumentRepository: failed to update match job ${id}: ${error?.message ?? 'not found'}`);
    }
    return fromMatchRow(data);
  }

  async listMatchJobs(documentId: string): Promise<MatchJob[]> {
    const { data, error } = await this.client
      .from(MATCHES_TABLE)
      .select('*')
      .eq('resume_id', documentId)
      .order('created_at', { ascending: true });

    if (error) {
      throw new Error(`DocumentRepository: failed to list match jobs for ${documentId}: ${error.message}`);
    }
    return (data ?? []).map((row: unknown) => fromMatchRow(row));
  }

  async ping(): Promise<boolean> {
    const { error } = await this.client
      .from(RESUMES_TABLE)
      .select('id', { head: true, count: 'exact' })
      .limit(1);
    return !error;
  }
}
