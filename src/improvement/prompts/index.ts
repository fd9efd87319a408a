/**
 * Prompt templates for rewriting, previewing and extracting resumes and jobs.
 */

import { buildStructuredPrompt, describeJsonShape, escapePromptText } from '../../shared/llm/prompts';

export interface ResumeImprovementPromptInput {
  rawJobDescription: string;
  extractedJobKeywords: string;
  rawResume: string;
  extractedResumeKeywords: string;
  currentCosineSimilarity: number;
}

export function buildResumeImprovementPrompt(input: ResumeImprovementPromptInput): string {
  return buildStructuredPrompt(
    'You are an expert resume editor and talent acquisition specialist. Revise the resume below so it aligns more closely with the job description and raises its cosine similarity to the job keywords.',
    [
      'Work the job keywords into the resume where the candidate plausibly has that experience.',
      'Rewrite bullet points to lead with the skills and outcomes the job asks for.',
      'Never invent employers, titles, dates, degrees or certifications.',
      'Keep the resume readable for a human recruiter; do not stuff keywords.',
      'Return only the revised resume as Markdown, without commentary.'
    ],
    [
      { title: 'Job description', body: escapePromptText(input.rawJobDescription) },
      { title: 'Extracted job keywords', body: input.extractedJobKeywords },
      { title: 'Original resume', body: escapePromptText(input.rawResume) },
      { title: 'Extracted resume keywords', body: input.extractedResumeKeywords },
      {
        title: 'Current cosine similarity',
        body: `${input.currentCosineSimilarity.toFixed(4)} (aim to increase this value)`
      }
    ],
    'Markdown resume'
  );
}

const RESUME_PREVIEW_SHAPE = {
  personalInfo: {
    name: 'string',
    title: 'string | null',
    email: 'string | null',
    phone: 'string | null',
    location: 'string | null',
    website: 'string | null',
    linkedin: 'string | null',
    github: 'string | null'
  },
  summary: 'string | null',
  experience: [
    { id: 'integer', title: 'string', company: 'string', location: 'string | null', years: 'string | null', description: ['string'] }
  ],
  education: [
    { id: 'integer', institution: 'string', degree: 'string', years: 'string | null', description: 'string | null' }
  ],
  skills: ['string']
};

export function buildResumePreviewPrompt(resumeMarkdown: string): string {
  return buildStructuredPrompt(
    'Parse the resume below into JSON for display.',
    [
      'Respond with JSON only, matching the output format exactly.',
      'Number experience and education entries from 1 in the order they appear.',
      'Use null for fields the resume does not state.'
    ],
    [{ title: 'Resume', body: escapePromptText(resumeMarkdown) }],
    describeJsonShape(RESUME_PREVIEW_SHAPE)
  );
}

const STRUCTURED_JOB_SHAPE = {
  job_title: 'string',
  company_profile: { company_name: 'string', industry: 'string | null', website: 'string | null', description: 'string | null' },
  location: { city: 'string | null', state: 'string | null', country: 'string | null', remote_status: 'string | null' },
  date_posted: 'string | null',
  employment_type: 'string | null',
  job_summary: 'string',
  key_responsibilities: ['string'],
  qualifications: { required: ['string'], preferred: ['string'] },
  compensation_and_benefits: ['string'],
  application_info: ['string'],
  extracted_keywords: ['string']
};

export function buildStructuredJobPrompt(jobDescription: string): string {
  return buildStructuredPrompt(
    'Extract structured data from the job description below.',
    [
      'Respond with JSON only, matching the output format exactly.',
      'extracted_keywords lists the skills, tools and domain terms a candidate must show, most important first.',
      'Use null or an empty list for anything the description does not state.'
    ],
    [{ title: 'Job description', body: escapePromptText(jobDescription) }],
    describeJsonShape(STRUCTURED_JOB_SHAPE)
  );
}

const STRUCTURED_RESUME_SHAPE = {
  personal_data: {
    first_name: 'string',
    last_name: 'string | null',
    email: 'string | null',
    phone: 'string | null',
    linkedin: 'string | null',
    portfolio: 'string | null',
    location: { city: 'string | null', country: 'string | null' }
  },
  experiences: [
    { job_title: 'string', company: 'string | null', location: 'string | null', start_date: 'string | null', end_date: 'string | null', description: ['string'] }
  ],
  education: [
    { institution: 'string', degree: 'string | null', field_of_study: 'string | null', start_date: 'string | null', end_date: 'string | null' }
  ],
  skills: ['string'],
  extracted_keywords: ['string']
};

export function buildStructuredResumePrompt(resumeText: string): string {
  return buildStructuredPrompt(
    'Extract structured data from the resume below.',
    [
      'Respond with JSON only, matching the output format exactly.',
      'extracted_keywords lists the skills, tools and domain terms the resume demonstrates.',
      'Use null or an empty list for anything the resume does not state.'
    ],
    [{ title: 'Resume', body: escapePromptText(resumeText) }],
    describeJsonShape(STRUCTURED_RESUME_SHAPE)
  );
}
