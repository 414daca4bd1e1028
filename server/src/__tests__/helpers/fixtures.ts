import { vi } from 'vitest';
import { InferenceClient } from '../../lib/inference.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../../lib/llm-provider.js';
import type { UploadStore } from '../../lib/upload-store.js';

// ─── LLM fakes ────────────────────────────────────────────────────────────────

export function makeLLMResponse(data: unknown): ChatResponse {
  return {
    text: typeof data === 'string' ? data : JSON.stringify(data),
    usage: { input_tokens: 0, output_tokens: 0 },
  };
}

export function createFakeProvider() {
  const chat = vi.fn<(params: ChatParams) => Promise<ChatResponse>>();
  const provider: LLMProvider = { name: 'fake', chat };
  return { provider, chat };
}

export function createTestInference() {
  const { provider, chat } = createFakeProvider();
  const inference = new InferenceClient(provider, { model: 'test-model', maxTokens: 1024, timeoutMs: 5_000 });
  return { inference, chat };
}

/** The user message content sent on the nth chat call. */
export function userContent(chat: ReturnType<typeof createFakeProvider>['chat'], call: number): string {
  const params = chat.mock.calls[call]?.[0];
  return params?.messages[0]?.content ?? '';
}

// ─── Upload store fake ────────────────────────────────────────────────────────

export class InMemoryUploadStore implements UploadStore {
  files = new Map<string, Buffer>();
  failSave = false;

  async save(documentId: string, fileName: string, bytes: Buffer): Promise<string> {
    if (this.failSave) throw new Error('disk full');
    const storagePath = `mem://${documentId}/${fileName}`;
    this.files.set(storagePath, Buffer.from(bytes));
    return storagePath;
  }

  async read(storagePath: string): Promise<Buffer> {
    const bytes = this.files.get(storagePath);
    if (!bytes) throw new Error(`no such upload: ${storagePath}`);
    return bytes;
  }

  async remove(storagePath: string): Promise<void> {
    this.files.delete(storagePath);
  }
}

// ─── Model outputs ────────────────────────────────────────────────────────────

export const JOHN_DOE_RESUME = `John Doe
john.doe@email.com | (555) 010-0199 | Springfield, IL

SUMMARY
Backend engineer with eight years of experience building data services.

EXPERIENCE
Senior Software Engineer, Northwind Labs (2019 - Present)
- Led the migration of billing services to an event-driven design
- Mentored four engineers

Software Engineer, Contoso Data (2016 - 2019)
- Built ingestion pipelines in Python

EDUCATION
B.S. Computer Science, State University, 2016

SKILLS
Python, Go, PostgreSQL, Kubernetes

CERTIFICATIONS
AWS Certified Solutions Architect – Associate
`;

export function makeStructuredExtraction() {
  return {
    personalInfo: {
      name: { first: 'John', last: 'Doe', full: 'John Doe' },
      contact: {
        email: 'john.doe@email.com',
        phone: '(555) 010-0199',
        address: { street: null, city: 'Springfield', state: 'IL', zipCode: null, country: null },
        linkedin: null,
        website: null,
      },
    },
    summary: {
      text: 'Backend engineer with eight years of experience building data services.',
      careerLevel: 'senior',
      industryFocus: 'Software',
    },
    experience: [
      {
        title: 'Senior Software Engineer',
        company: 'Northwind Labs',
        location: null,
        startDate: '2019',
        endDate: null,
        current: true,
        duration: null,
        description: null,
        achievements: ['Led the migration of billing services to an event-driven design', 'Mentored four engineers'],
        technologies: [],
      },
      {
        title: 'Software Engineer',
        company: 'Contoso Data',
        startDate: '2016',
        endDate: '2019',
        current: false,
        achievements: ['Built ingestion pipelines in Python'],
        technologies: ['Python'],
      },
    ],
    education: [
      { degree: 'B.S.', field: 'Computer Science', institution: 'State University', graduationDate: '2016', honors: [] },
    ],
    skills: {
      technical: [{ category: 'Programming Languages', items: ['Python', 'Go'] }],
      soft: ['Mentoring'],
      languages: [],
    },
    certifications: [{ name: 'AWS Certified Solutions Architect – Associate', issuer: 'Amazon Web Services' }],
    assessment: {
      qualityScore: 82,
      completenessScore: 75,
      suggestions: ['Quantify the billing migration impact'],
      industryFit: { Software: 0.9, Finance: 0.4 },
    },
  };
}

export function makeAnonymizedResume() {
  const { assessment: _assessment, ...resume } = makeStructuredExtraction();
  return {
    ...resume,
    personalInfo: {
      name: { first: '[REDACTED]', last: '[REDACTED]', full: '[REDACTED]' },
      contact: {
        email: '[REDACTED]',
        phone: '[REDACTED]',
        address: { street: null, city: '[REDACTED]', state: '[REDACTED]', zipCode: null, country: null },
        linkedin: null,
        website: null,
      },
    },
  };
}

export const BIAS_REPORT = {
  biasDetected: true,
  findings: [{ category: 'age', finding: 'Graduation year listed', suggestion: 'Remove the year' }],
};

export const COMPENSATION_ESTIMATE = {
  min: 140000,
  max: 175000,
  currency: 'USD',
  comments: 'Senior backend range for the Midwest',
};

export const CAREER_PROGRESSION = {
  suggestedNextRoles: ['Staff Software Engineer'],
  improvementAreas: ['System design writing'],
  comments: 'Steady progression toward technical leadership',
};

function categoryScore(score: number, weight: number) {
  return { score, weight, details: {} };
}

export function makeMatchAnalysis() {
  return {
    matchingResults: {
      overallScore: 78,
      confidence: 0.8,
      recommendation: 'good_match',
      categoryScores: {
        skillsMatch: categoryScore(85, 0.35),
        experienceMatch: categoryScore(80, 0.3),
        educationMatch: categoryScore(70, 0.1),
        roleAlignment: categoryScore(75, 0.15),
        locationMatch: categoryScore(60, 0.1),
      },
      strengthAreas: ['Python'],
      gapAnalysis: {
        criticalGaps: [],
        improvementAreas: [{ category: 'skills', missing: ['Terraform'], impact: 'low', suggestion: 'Add IaC work' }],
      },
      salaryAlignment: {
        candidateExpectation: '$150k',
        jobSalaryRange: '$140k-$170k',
        marketRate: null,
        alignment: 'aligned',
      },
      competitiveAdvantages: ['Event-driven migration experience'],
    },
    explanation: {
      summary: 'Strong backend fit with minor infrastructure gaps.',
      keyFactors: ['Python depth'],
      recommendations: ['Highlight Kubernetes work'],
    },
  };
}

export const JOB_DESCRIPTION = {
  title: 'Staff Backend Engineer',
  company: 'Fabrikam',
  location: 'Remote',
  skills: { required: ['Python'], preferred: ['Terraform'] },
  salary: { min: 140000, max: 170000, currency: 'USD' },
  benefits: [],
};

export const MATCH_OPTIONS = {
  includeExplanation: true,
  detailedBreakdown: true,
  suggestImprovements: true,
};
