/**
 * Validation Schemas
 *
 * Zod schemas for the structured data exchanged with the LLM and stored
 * alongside source documents.
 */

import { z } from 'zod';

/**
 * Serialized keyword field of a processed document:
 * {"extracted_keywords": ["python", "sql"]}
 */
export const KeywordsPayloadSchema = z.object({
  extracted_keywords: z.array(z.string()).min(1)
});

export type KeywordsPayload = z.infer<typeof KeywordsPayloadSchema>;

// ============================================================================
// Resume preview
// ============================================================================

export const PersonalInfoSchema = z.object({
  name: z.string(),
  title: z.string().nullable().default(null),
  email: z.string().nullable().default(null),
  phone: z.string().nullable().default(null),
  location: z.string().nullable().default(null),
  website: z.string().nullable().default(null),
  linkedin: z.string().nullable().default(null),
  github: z.string().nullable().default(null)
});

export const ExperienceItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  company: z.string(),
  location: z.string().nullable().default(null),
  years: z.string().nullable().default(null),
  description: z.array(z.string()).default([])
});

export const EducationItemSchema = z.object({
  id: z.number().int(),
  institution: z.string(),
  degree: z.string(),
  years: z.string().nullable().default(null),
  description: z.string().nullable().default(null)
});

/**
 * Display-oriented view of an improved resume. Optional fields are always
 * present, null when the resume does not state them.
 */
export const ResumePreviewSchema = z.object({
  personalInfo: PersonalInfoSchema,
  summary: z.string().nullable().default(null),
  experience: z.array(ExperienceItemSchema).default([]),
  education: z.array(EducationItemSchema).default([]),
  skills: z.array(z.string()).default([])
});

export type ResumePreview = z.infer<typeof ResumePreviewSchema>;

// ============================================================================
// Structured extraction
// ============================================================================

export const StructuredJobSchema = z.object({
  job_title: z.string(),
  company_profile: z.object({
    company_name: z.string(),
    industry: z.string().nullish(),
    website: z.string().nullish(),
    description: z.string().nullish()
  }).nullish(),
  location: z.object({
    city: z.string().nullish(),
    state: z.string().nullish(),
    country: z.string().nullish(),
    remote_status: z.string().nullish()
  }).nullish(),
  date_posted: z.string().nullish(),
  employment_type: z.string().nullish(),
  job_summary: z.string(),
  key_responsibilities: z.array(z.string()).default([]),
  qualifications: z.object({
    required: z.array(z.string()).default([]),
    preferred: z.array(z.string()).default([])
  }).nullish(),
  compensation_and_benefits: z.array(z.string()).default([]),
  application_info: z.array(z.string()).default([]),
  extracted_keywords: z.array(z.string()).default([])
});

export type StructuredJob = z.infer<typeof StructuredJobSchema>;

export const StructuredResumeSchema = z.object({
  personal_data: z.object({
    first_name: z.string(),
    last_name: z.string().nullish(),
    email: z.string().nullish(),
    phone: z.string().nullish(),
    linkedin: z.string().nullish(),
    portfolio: z.string().nullish(),
    location: z.object({
      city: z.string().nullish(),
      country: z.string().nullish()
    }).nullish()
  }),
  experiences: z.array(z.object({
    job_title: z.string(),
    company: z.string().nullish(),
    location: z.string().nullish(),
    start_date: z.string().nullish(),
    end_date: z.string().nullish(),
    description: z.array(z.string()).default([])
  })).default([]),
  education: z.array(z.object({
    institution: z.string(),
    degree: z.string().nullish(),
    field_of_study: z.string().nullish(),
    start_date: z.string().nullish(),
    end_date: z.string().nullish()
  })).default([]),
  skills: z.array(z.string()).default([]),
  extracted_keywords: z.array(z.string()).default([])
});

export type StructuredResume = z.infer<typeof StructuredResumeSchema>;
