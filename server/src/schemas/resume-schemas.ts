/**
 * Zod schemas for resume records and every enrichment stage's model output.
 *
 * The same schemas are sent to the model (as JSON Schema) and used to
 * validate what comes back, so they describe output shapes only: missing
 * scalars are null, missing lists default to [].
 */

import { z } from 'zod';

export const REDACTED = '[REDACTED]';

// ─── Structured resume ────────────────────────────────────────────────

export const PersonNameSchema = z.object({
  first: z.string().nullish(),
  last: z.string().nullish(),
  full: z.string(),
});

export const AddressSchema = z.object({
  street: z.string().nullish(),
  city: z.string().nullish(),
  state: z.string().nullish(),
  zipCode: z.string().nullish(),
  country: z.string().nullish(),
});

export const ContactSchema = z.object({
  email: z.string().nullish(),
  phone: z.string().nullish(),
  address: AddressSchema.nullish(),
  linkedin: z.string().nullish(),
  website: z.string().nullish(),
});

export const PersonalInfoSchema = z.object({
  name: PersonNameSchema,
  contact: ContactSchema.nullish(),
});

export const SummarySchema = z.object({
  text: z.string().nullish(),
  careerLevel: z.string().nullish(),
  industryFocus: z.string().nullish(),
});

export const WorkExperienceSchema = z.object({
  title: z.string(),
  company: z.string(),
  location: z.string().nullish(),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
  current: z.boolean().default(false),
  duration: z.string().nullish(),
  description: z.string().nullish(),
  achievements: z.array(z.string()).default([]),
  technologies: z.array(z.string()).default([]),
});

export const EducationSchema = z.object({
  degree: z.string(),
  field: z.string().nullish(),
  institution: z.string(),
  location: z.string().nullish(),
  graduationDate: z.string().nullish(),
  gpa: z.number().nullish(),
  honors: z.array(z.string()).default([]),
});

export const SkillCategorySchema = z.object({
  category: z.string(),
  items: z.array(z.string()).default([]),
});

export const LanguageSkillSchema = z.object({
  language: z.string(),
  proficiency: z.string().nullish(),
});

export const SkillsSchema = z.object({
  technical: z.array(SkillCategorySchema).default([]),
  soft: z.array(z.string()).default([]),
  languages: z.array(LanguageSkillSchema).default([]),
});

export const CertificationSchema = z.object({
  name: z.string(),
  issuer: z.string().nullish(),
  issueDate: z.string().nullish(),
  expiryDate: z.string().nullish(),
  credentialId: z.string().nullish(),
});

export const ParsedResumeSchema = z.object({
  personalInfo: PersonalInfoSchema.nullish(),
  summary: SummarySchema.nullish(),
  experience: z.array(WorkExperienceSchema).default([]),
  education: z.array(EducationSchema).default([]),
  skills: SkillsSchema.nullish(),
  certifications: z.array(CertificationSchema).default([]),
});

export type ParsedResume = z.infer<typeof ParsedResumeSchema>;

// ─── structured_extraction output ─────────────────────────────────────
// The mandatory stage also scores the resume; that block is moved into the
// enrichment record before the structured data is stored.

export const ResumeAssessmentSchema = z.object({
  qualityScore: z.number().min(0).max(100).nullish(),
  completenessScore: z.number().min(0).max(100).nullish(),
  suggestions: z.array(z.string()).default([]),
  industryFit: z.record(z.string(), z.number().min(0).max(1)).default({}),
});

export type ResumeAssessment = z.infer<typeof ResumeAssessmentSchema>;

export const StructuredExtractionSchema = ParsedResumeSchema.extend({
  assessment: ResumeAssessmentSchema.nullish(),
});

// ─── Optional stage outputs ───────────────────────────────────────────

export const BiasFindingSchema = z.object({
  category: z.string(),
  finding: z.string(),
  suggestion: z.string(),
});

export const BiasReportSchema = z.object({
  biasDetected: z.boolean().default(false),
  findings: z.array(BiasFindingSchema).default([]),
});

export type BiasReport = z.infer<typeof BiasReportSchema>;

export const CompensationEstimateSchema = z.object({
  min: z.number().nullish(),
  max: z.number().nullish(),
  currency: z.string().default('USD'),
  comments: z.string(),
});

export type CompensationEstimate = z.infer<typeof CompensationEstimateSchema>;

export const CareerProgressionSchema = z.object({
  suggestedNextRoles: z.array(z.string()).default([]),
  improvementAreas: z.array(z.string()).default([]),
  comments: z.string(),
});

export type CareerProgression = z.infer<typeof CareerProgressionSchema>;

// ─── Stored enrichment record ─────────────────────────────────────────

export const EnrichmentSchema = z.object({
  qualityScore: z.number().min(0).max(100).nullable().default(null),
  completenessScore: z.number().min(0).max(100).nullable().default(null),
  suggestions: z.array(z.string()).default([]),
  industryFit: z.record(z.string(), z.number()).default({}),
  biasReport: BiasReportSchema.nullable().default(null),
  compensationEstimate: CompensationEstimateSchema.nullable().default(null),
  anonymizedData: ParsedResumeSchema.nullable().default(null),
  careerProgression: CareerProgressionSchema.nullable().default(null),
});

export type Enrichment = z.infer<typeof EnrichmentSchema>;

// ─── PUT /resumes/:id body ────────────────────────────────────────────

export const ManualResumeUpdateSchema = ParsedResumeSchema.extend({
  aiEnhancements: EnrichmentSchema.nullish(),
});
