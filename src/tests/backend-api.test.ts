/**
 * Backend API Integration Tests
 *
 * Drives the Express app through supertest with in-memory storage and
 * scripted model capabilities.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../backend/server';
import type { AppServices } from '../backend/services';
import { MemoryEntityStore } from '../shared/storage/memoryStore';
import { StructuredExtractionService } from '../improvement/ingestion/structuredExtraction';
import { ScoreImprovementService } from '../improvement/orchestrator';
import { ReadinessValidator } from '../improvement/readiness/readinessValidator';
import { DEFAULT_CONFIG } from '../improvement/config';
import { ProcessingStatus } from '../improvement/types';
import type { SchemaExtractor } from '../improvement/types';
import {
  FixedExtractor,
  JOB_ID,
  JOB_TEXT,
  LookupEmbedder,
  PREVIEW_ANSWER,
  RESUME_ID,
  RESUME_TEXT,
  ScriptedRewriter,
  fakeRenderer,
  readyStore,
  seed
} from './improvement/fixtures';

const VECTORS = {
  'python, sql, docker': [1, 0],
  [RESUME_TEXT]: [1, 1],
  '# Improved': [3, 1]
};

const JOB_ANSWER = {
  job_title: 'Backend Engineer',
  job_summary: 'Build and run APIs',
  extracted_keywords: ['python', 'docker']
};

function buildApp(store: MemoryEntityStore, ingestionExtractor: SchemaExtractor = new FixedExtractor(JOB_ANSWER)): Application {
  const readiness = new ReadinessValidator(store);
  const services: AppServices = {
    readiness,
    improvement: new ScoreImprovementService({
      validator: readiness,
      embedder: new LookupEmbedder(VECTORS, [0, 0]),
      rewriter: new ScriptedRewriter(['# Improved']),
      extractor: new FixedExtractor(PREVIEW_ANSWER),
      renderer: fakeRenderer(),
      config: DEFAULT_CONFIG
    }),
    extraction: new StructuredExtractionService(store, ingestionExtractor, readiness)
  };
  return createApp(services);
}

describe('Backend API', () => {
  let store: MemoryEntityStore;
  let app: Application;

  beforeEach(async () => {
    store = await readyStore();
    app = buildApp(store);
  });

  it('GET /api/health reports ok', async () => {
    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  describe('POST /api/v1/resumes/improve', () => {
    it('returns the improvement result with the request id', async () => {
      const res = await request(app)
        .post('/api/v1/resumes/improve')
        .set('x-request-id', 'req-123')
        .send({ resume_id: RESUME_ID, job_id: JOB_ID });

      expect(res.status).toBe(200);
      expect(res.body.request_id).toBe('req-123');
      expect(res.body.data.resume_id).toBe(RESUME_ID);
      expect(res.body.data.job_id).toBe(JOB_ID);
      expect(res.body.data.updated_resume).toBe('<html># Improved</html>');
      expect(res.body.data.original_score).toBeCloseTo(Math.SQRT1_2, 10);
      expect(res.body.data.new_score).toBeCloseTo(3 / Math.sqrt(10), 10);
    });

    it('rejects a body without ids', async () => {
      const res = await request(app).post('/api/v1/resumes/improve').send({ resume_id: RESUME_ID });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(res.body.details).toEqual([{ field: 'job_id', message: 'Required' }]);
    });

    it('maps a missing resume to 404', async () => {
      const res = await request(app)
        .post('/api/v1/resumes/improve')
        .send({ resume_id: 'missing', job_id: JOB_ID });

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('RESOURCE_NOT_FOUND');
      expect(res.body.message).toBe('Resume with id missing not found');
    });

    it('maps an unprocessed job to 422', async () => {
      await seed(store, 'job', 'job-2', JOB_TEXT, { status: ProcessingStatus.PROCESSING });

      const res = await request(app)
        .post('/api/v1/resumes/improve')
        .send({ resume_id: RESUME_ID, job_id: 'job-2' });

      expect(res.status).toBe(422);
      expect(res.body.error).toBe('NOT_PARSED');
    });

    it('streams progress as server-sent events', async () => {
      await seed(store, 'job', 'job-2', JOB_TEXT, { status: ProcessingStatus.PROCESSING });

      const res = await request(app)
        .post('/api/v1/resumes/improve?stream=true')
        .buffer(true)
        .send({ resume_id: RESUME_ID, job_id: 'job-2' });

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/event-stream');
      expect(res.text).toBe(
        'data: {"status": "starting", "message": "Validating data completeness..."}\n\n' +
        'data: {"status": "error", "message": "Validation failed: Job processing is not complete. Status: processing"}\n\n'
      );
    });

    it('ends a successful stream with the completed event', async () => {
      const res = await request(app)
        .post('/api/v1/resumes/improve?stream=true')
        .buffer(true)
        .send({ resume_id: RESUME_ID, job_id: JOB_ID });

      const lines = res.text.split('\n\n').filter(Boolean);
      expect(lines).toHaveLength(6);
      expect(lines[5].startsWith('data: {"status": "completed", "data": {"resume_id": "resume-1"')).toBe(true);
    });
  });

  describe('POST /api/v1/resumes/upload', () => {
    it('stores the resume and returns its id', async () => {
      const extractor = new FixedExtractor({
        personal_data: { first_name: 'Jane' },
        extracted_keywords: ['python']
      });
      app = buildApp(store, extractor);

      const res = await request(app).post('/api/v1/resumes/upload').send({ content: RESUME_TEXT });

      expect(res.status).toBe(201);
      expect(typeof res.body.resume_id).toBe('string');
      expect((await store.getSource('resume', res.body.resume_id))?.content).toBe(RESUME_TEXT);
    });

    it('maps extraction failures to 422', async () => {
      const res = await request(app).post('/api/v1/resumes/upload').send({ content: RESUME_TEXT });

      expect(res.status).toBe(422);
      expect(res.body.error).toBe('STRUCTURED_EXTRACTION_FAILED');
    });

    it('rejects empty content', async () => {
      const res = await request(app).post('/api/v1/resumes/upload').send({ content: '   ' });

      expect(res.status).toBe(400);
      expect(res.body.details).toEqual([{ field: 'content', message: 'Resume content is empty' }]);
    });
  });

  describe('GET /api/v1/resumes/readiness', () => {
    it('reports a ready pair', async () => {
      const res = await request(app).get(`/api/v1/resumes/readiness?resume_id=${RESUME_ID}&job_id=${JOB_ID}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        valid: true,
        resume_id: RESUME_ID,
        job_id: JOB_ID,
        message: 'Both resume and job data are ready for improvement'
      });
    });

    it('reports why a pair is not ready', async () => {
      const res = await request(app).get(`/api/v1/resumes/readiness?resume_id=${RESUME_ID}&job_id=missing`);

      expect(res.body).toEqual({
        valid: false,
        error: 'RESOURCE_NOT_FOUND',
        message: 'Job with id missing not found'
      });
    });
  });

  describe('jobs', () => {
    it('POST /api/v1/jobs/upload stores every description', async () => {
      const res = await request(app)
        .post('/api/v1/jobs/upload')
        .send({ resume_id: RESUME_ID, job_descriptions: ['First job', 'Second job'] });

      expect(res.status).toBe(201);
      expect(res.body.job_id).toHaveLength(2);
    });

    it('POST /api/v1/jobs/upload returns 404 for an unknown resume', async () => {
      const res = await request(app)
        .post('/api/v1/jobs/upload')
        .send({ resume_id: 'missing', job_descriptions: ['A job'] });

      expect(res.status).toBe(404);
    });

    it('GET /api/v1/jobs returns the job with processed data', async () => {
      const res = await request(app).get(`/api/v1/jobs?job_id=${JOB_ID}`);

      expect(res.status).toBe(200);
      expect(res.body.data.job_id).toBe(JOB_ID);
      expect(res.body.data.extracted_keywords).toEqual(['python', 'sql', 'docker']);
    });

    it('GET /api/v1/jobs returns 404 for an unprocessed job', async () => {
      await seed(store, 'job', 'job-2', JOB_TEXT, { status: ProcessingStatus.FAILED });

      const res = await request(app).get('/api/v1/jobs?job_id=job-2');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('JOB_NOT_FOUND');
    });
  });
});
