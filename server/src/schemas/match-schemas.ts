/**
 * Zod schemas for job descriptions, match requests and match results.
 */

import { z } from 'zod';

// ─── Requirements ─────────────────────────────────────────────────────

const RequirementListSchema = z.object({
  required: z.array(z.string()).default([]),
  preferred: z.array(z.string()).default([]),
});

export const JobDescriptionSchema = z.object({
  title: z.string().min(1),
  company: z.string().nullish(),
  location: z.string().nullish(),
  type: z.string().nullish(),
  experience: z
    .object({
      minimum: z.number().min(0).nullish(),
      preferred: z.number().min(0).nullish(),
      level: z.string().nullish(),
    })
    .nullish(),
  description: z.string().nullish(),
  requirements: RequirementListSchema.nullish(),
  skills: RequirementListSchema.nullish(),
  salary: z
    .object({
      min: z.number().nullish(),
      max: z.number().nullish(),
      currency: z.string().nullish(),
    })
    .nullish(),
  benefits: z.array(z.string()).default([]),
  industry: z.string().nullish(),
});

export type JobDescription = z.infer<typeof JobDescriptionSchema>;

export const MatchOptionsSchema = z.object({
  includeExplanation: z.boolean().default(true),
  detailedBreakdown: z.boolean().default(true),
  suggestImprovements: z.boolean().default(true),
});

export type MatchOptions = z.infer<typeof MatchOptionsSchema>;

export const MatchRequestSchema = z.object({
  jobDescription: JobDescriptionSchema,
  options: MatchOptionsSchema.default({
    includeExplanation: true,
    detailedBreakdown: true,
    suggestImprovements: true,
  }),
});

// ─── Model output ─────────────────────────────────────────────────────

export const CategoryScoreSchema = z.object({
  score: z.number().min(0).max(100),
  weight: z.number().min(0).max(1),
  details: z.record(z.string(), z.unknown()).default({}),
});

export const CategoryScoresSchema = z.object({
  skillsMatch: CategoryScoreSchema,
  experienceMatch: CategoryScoreSchema,
  educationMatch: CategoryScoreSchema,
  roleAlignment: CategoryScoreSchema,
  locationMatch: CategoryScoreSchema,
});

export const GapSchema = z.object({
  category: z.string(),
  missing: z.union([z.string(), z.array(z.string())]),
  impact: z.string(),
  suggestion: z.string(),
});

export const GapAnalysisSchema = z.object({
  criticalGaps: z.array(GapSchema).default([]),
  improvementAreas: z.array(GapSchema).default([]),
});

export const SalaryAlignmentSchema = z.object({
  candidateExpectation: z.string(),
  jobSalaryRange: z.string(),
  marketRate: z.string().nullish(),
  alignment: z.string(),
});

export const MatchingResultsSchema = z.object({
  overallScore: z.number().min(0).max(100),
  confidence: z.number().min(0).max(1),
  recommendation: z.string(),
  categoryScores: CategoryScoresSchema,
  strengthAreas: z.array(z.string()).default([]),
  gapAnalysis: GapAnalysisSchema,
  salaryAlignment: SalaryAlignmentSchema,
  competitiveAdvantages: z.array(z.string()).default([]),
});

export const MatchExplanationSchema = z.object({
  summary: z.string(),
  keyFactors: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
});

/** What the model is asked for; identity and timing are filled in afterwards. */
export const MatchAnalysisSchema = z.object({
  matchingResults: MatchingResultsSchema,
  explanation: MatchExplanationSchema,
  metadata: z
    .object({
      algorithm: z.string().nullish(),
      confidenceFactors: z.record(z.string(), z.number()).nullish(),
    })
    .nullish(),
});

// ─── Stored result ────────────────────────────────────────────────────

export const MatchMetadataSchema = z.object({
  matchedAt: z.string(),
  processingTime: z.number().min(0),
  algorithm: z.string(),
  confidenceFactors: z.record(z.string(), z.number()).nullable(),
});

export const MatchResultSchema = z.object({
  matchId: z.string(),
  resumeId: z.string(),
  jobTitle: z.string(),
  company: z.string().nullable(),
  matchingResults: MatchingResultsSchema,
  explanation: MatchExplanationSchema,
  metadata: MatchMetadataSchema,
});

export type MatchResult = z.infer<typeof MatchResultSchema>;

export const MatchFailureSchema = z.object({
  error: z.string(),
});

export type MatchFailure = z.infer<typeof MatchFailureSchema>;
