import type { MatchJob, ResumeDocument } from '../pipeline/types.js';

export function serializeResumeSummary(document: ResumeDocument) {
  return {
    id: document.id,
    file_name: document.fileName,
    content_type: document.contentType,
    file_size: document.fileSize,
    status: document.status,
    uploaded_at: document.createdAt,
  };
}

export function serializeResume(document: ResumeDocument) {
  return {
    ...serializeResumeSummary(document),
    processed_at: document.completedAt,
    structured_data: document.structuredData,
    ai_enhancements: document.enrichment,
  };
}

export function serializeMatchJob(job: MatchJob) {
  return {
    match_id: job.id,
    resume_id: job.documentId,
    status: job.status,
    created_at: job.createdAt,
  };
}
