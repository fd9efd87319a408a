/**
 * Preview Renderer
 *
 * Best-effort structured view of an improved resume. A model answer that
 * does not fit the preview schema yields null rather than failing the run.
 */

import type { Logger } from 'pino';
import { loggers } from '../../shared/logging/logger';
import { ResumePreviewSchema } from '../../shared/validation/schemas';
import type { ResumePreview } from '../../shared/validation/schemas';
import { ImprovementErrorCode, isImprovementError } from '../errors/types';
import { callCapability } from '../controller/improvementLoop';
import { buildResumePreviewPrompt } from '../prompts';
import type { SchemaExtractor } from '../types';

export class PreviewRenderer {
  private readonly log: Logger;

  constructor(private readonly extractor: SchemaExtractor, logger?: Logger) {
    this.log = logger ?? loggers.improvement;
  }

  async render(resumeMarkdown: string): Promise<ResumePreview | null> {
    const prompt = buildResumePreviewPrompt(resumeMarkdown);
    try {
      return await callCapability('extraction', () => this.extractor.run(prompt, ResumePreviewSchema));
    } catch (error) {
      if (isImprovementError(error, ImprovementErrorCode.SCHEMA_VALIDATION_FAILED)) {
        this.log.info({ details: error.technicalDetails }, 'Resume preview failed schema validation');
        return null;
      }
      throw error;
    }
  }
}
