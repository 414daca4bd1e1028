/**
 * Document Repository: persistence seam for resume documents and match jobs.
 *
 * Pipelines only ever read a record by id and write it back whole. The
 * in-memory implementation backs tests and local runs without Supabase;
 * see document-repository-supabase.ts for the Postgres tables.
 */

import { randomUUID } from 'node:crypto';
import type {
  MatchJob,
  NewDocument,
  NewMatchJob,
  ResumeDocument,
} from '../pipeline/types.js';

export interface DocumentRepository {
  readonly name: string;
  createDocument(input: NewDocument): Promise<ResumeDocument>;
  getDocument(id: string): Promise<ResumeDocument | null>;
  /** Writes the full record; throws when the id is unknown. */
  updateDocument(document: ResumeDocument): Promise<ResumeDocument>;
  deleteDocument(id: string): Promise<boolean>;
  createMatchJob(input: NewMatchJob): Promise<MatchJob>;
  getMatchJob(id: string): Promise<MatchJob | null>;
  updateMatchJob(job: MatchJob): Promise<MatchJob>;
  listMatchJobs(documentId: string): Promise<MatchJob[]>;
  ping(): Promise<boolean>;
}

export class InMemoryDocumentRepository implements DocumentRepository {
  readonly name = 'memory';
  private documents = new Map<string, ResumeDocument>();
  private matchJobs = new Map<string, MatchJob>();

  async createDocument(input: NewDocument): Promise<ResumeDocument> {
    const document: ResumeDocument = {
      ...input,
      id: randomUUID(),
      storagePath: null,
      status: 'pending',
      rawText: null,
      structuredData: null,
      enrichment: null,
      createdAt: new Date().toISOString(),
      completedAt: null,
    };
    this.documents.set(document.id, structuredClone(document));
    return document;
  }

  async getDocument(id: string): Promise<ResumeDocument | null> {
    const document = this.documents.get(id);
    return document ? structuredClone(document) : null;
  }

  async updateDocument(document: ResumeDocument): Promise<ResumeDocument> {
    if (!this.documents.has(document.id)) {
      throw new Error(`DocumentRepository: document ${document.id} not found`);
    }
    this.documents.set(document.id, structuredClone(document));
    return structuredClone(document);
  }

  async deleteDocument(id: string): Promise<boolean> {
    for (const [jobId, job] of this.matchJobs) {
      if (job.documentId === id) this.matchJobs.delete(jobId);
    }
    return this.documents.delete(id);
  }

  async createMatchJob(input: NewMatchJob): Promise<MatchJob> {
    if (!this.documents.has(input.documentId)) {
      throw new Error(`DocumentRepository: document ${input.documentId} not found`);
    }
    const job: MatchJob = {
      ...structuredClone(input),
      id: randomUUID(),
      status: 'pending',
      result: null,
      createdAt: new Date().toISOString(),
      completedAt: null,
    };
    this.matchJobs.set(job.id, structuredClone(job));
    return job;
  }

  async getMatchJob(id: string): Promise<MatchJob | null> {
    const job = this.matchJobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async updateMatchJob(job: MatchJob): Promise<MatchJob> {
    if (!this.matchJobs.has(job.id)) {
      throw new Error(`DocumentRepository: match job ${job.id} not found`);
    }
    this.matchJobs.set(job.id, structuredClone(job));
    return structuredClone(job);
  }

  async listMatchJobs(documentId: string): Promise<MatchJob[]> {
    return [...this.matchJobs.values()]
      .filter((job) => job.documentId === documentId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((job) => structuredClone(job));
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
