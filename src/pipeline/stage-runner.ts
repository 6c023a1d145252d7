/**
 * Stage Runner
 *
 * Runs one pipeline stage against a project: read inputs, prompt the
 * generator, decode the reply and materialize the blocks. The generator is
 * injected, so any stage can run against canned responses.
 */

import * as path from 'path';
import matter from 'gray-matter';
import { PipelineError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { decodeResponse, trimBlankLines, unwrapFence, type DecodeResult, type DroppedBlock } from '../artifacts/decoder.js';
import type { GrammarKind } from '../artifacts/grammar.js';
import {
  classifyReport,
  materialize,
  summarizeReport,
  type StageOutcome,
  type WriteReport,
} from '../artifacts/materializer.js';
import { projectSlug } from '../artifacts/slug.js';
import { collectInputs, formatInputs, type InputDocument } from '../project.js';
import { isDocType, DOC_TYPES, type StagePromptContext } from '../prompts/stage-prompts.js';
import type { ContentGenerator } from '../llm/types.js';
import { getStage, type PipelineStage, type StageId } from './stages.js';

export interface StageProgress {
  stage: StageId;
  message: string;
}

export interface StageRunnerOptions {
  generator: ContentGenerator;
  /** Generation attempts when a reply decodes to nothing (default 2) */
  maxAttempts?: number;
  extensionlessFiles?: readonly string[];
  logger?: Logger;
  onProgress?: (progress: StageProgress) => void;
}

export interface RunStageOptions {
  projectRoot: string;
  /** Idea text, or the subject of an idea list */
  idea?: string;
  instructions?: string;
  docType?: string;
  /** generate-ideas: list size (default 10) and file name */
  ideaCount?: number;
  listName?: string;
}

export const MAX_IDEA_COUNT = 50;

export interface StageResult {
  stage: StageId;
  outcome: StageOutcome;
  report: WriteReport;
  dropped: DroppedBlock[];
  attempts: number;
}

export class StageRunner {
  private generator: ContentGenerator;
  private maxAttempts: number;
  private extensionlessFiles?: readonly string[];
  private logger: Logger;
  private onProgress?: (progress: StageProgress) => void;

  constructor(options: StageRunnerOptions) {
    this.generator = options.generator;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.extensionlessFiles = options.extensionlessFiles;
    this.logger = options.logger ?? createLogger('Pipeline');
    this.onProgress = options.onProgress;
  }

  async run(stageId: string, options: RunStageOptions): Promise<StageResult> {
    const stage = getStage(stageId);
    const projectRoot = path.resolve(options.projectRoot);
    const ctx = await this.buildContext(stage, projectRoot, options);

    const prompt = stage.buildPrompt(ctx);
    this.logger.debug(`${stage.id}: prompt is ${prompt.length} chars`);

    let decoded: DecodeResult = { blocks: [], dropped: [] };
    let attempts = 0;

    while (attempts < this.maxAttempts) {
      attempts++;
      this.progress(stage, `${stage.title} (attempt ${attempts}/${this.maxAttempts})...`);

      const raw = await this.generate(stage, prompt);
      decoded = this.decodeOutput(stage, ctx, raw);
      if (decoded.blocks.length > 0) {
        break;
      }

      this.logger.warn(`DECODE_EMPTY: ${stage.id} reply contained no usable blocks (attempt ${attempts}/${this.maxAttempts})`);
    }

    if (decoded.blocks.length === 0) {
      throw new PipelineError(
        `${stage.id}: no usable blocks after ${attempts} attempt(s)`,
        'DECODE_EMPTY',
        { isRecoverable: false }
      );
    }

    this.progress(stage, `Writing ${decoded.blocks.length} artifact(s)...`);
    const report = await materialize(decoded.blocks, this.outputGrammar(stage), projectRoot, {
      extensionlessFiles: this.extensionlessFiles,
      logger: this.logger,
    });
    const outcome = classifyReport(report);

    if (outcome === 'failed') {
      const reasons = report.failed.map((failure) => `${failure.path} (${failure.reason})`).join(', ');
      throw new PipelineError(`${stage.id}: nothing was written: ${reasons}`, 'STAGE_FAILED');
    }
    if (outcome === 'partial') {
      this.logger.warn(`${stage.id} finished with failures: ${summarizeReport(report)}`);
    } else {
      this.logger.info(`${stage.id} finished: ${summarizeReport(report)}`);
    }

    return { stage: stage.id, outcome, report, dropped: decoded.dropped, attempts };
  }

  private async buildContext(stage: PipelineStage, projectRoot: string, options: RunStageOptions): Promise<StagePromptContext> {
    const idea = options.idea?.trim();
    if (stage.requiresIdea && !idea) {
      throw new PipelineError(`${stage.id} needs the idea text`, 'MISSING_INPUT');
    }

    const instructions = options.instructions?.trim();
    if (stage.requiresInstructions && !instructions) {
      throw new PipelineError(`${stage.id} needs a description of the changes`, 'MISSING_INPUT');
    }

    const ideaCount = options.ideaCount ?? 10;
    if (!Number.isInteger(ideaCount) || ideaCount < 1 || ideaCount > MAX_IDEA_COUNT) {
      throw new PipelineError(`${stage.id}: the idea count must be a whole number from 1 to ${MAX_IDEA_COUNT}`, 'MISSING_INPUT');
    }

    const listName = projectSlug(options.listName ?? 'ideas');
    if (!listName) {
      throw new PipelineError(`${stage.id}: '${options.listName ?? ''}' is not usable as a file name`, 'MISSING_INPUT');
    }

    let docType: string | undefined;
    if (stage.requiresDocType) {
      if (!options.docType || !isDocType(options.docType)) {
        throw new PipelineError(
          `${stage.id} needs a document type, one of: ${DOC_TYPES.join(', ')}`,
          'MISSING_INPUT'
        );
      }
      docType = options.docType;
    }

    this.progress(stage, 'Reading project documents...');
    const documents: InputDocument[] = [];
    for (const group of stage.inputs) {
      const found = await collectInputs(projectRoot, group.patterns, this.logger);
      if (group.required && found.length === 0) {
        throw new PipelineError(
          `${stage.id} needs ${group.patterns.join(' or ')} in ${projectRoot}; run the earlier stages first`,
          'MISSING_INPUT'
        );
      }
      for (const doc of found) {
        if (!documents.some((existing) => existing.path === doc.path)) {
          documents.push(doc);
        }
      }
    }
    this.logger.debug(`${stage.id}: ${documents.length} input document(s)`);

    return {
      projectName: path.basename(projectRoot),
      idea,
      instructions,
      docType,
      ideaCount,
      listName,
      inputs: formatInputs(documents),
    };
  }

  private async generate(stage: PipelineStage, prompt: string): Promise<string> {
    try {
      return await this.generator.generate(prompt);
    } catch (error) {
      if (PipelineError.isPipelineError(error)) {
        throw error;
      }
      throw new PipelineError(`${stage.id}: generation failed: ${errorMessage(error)}`, 'TRANSPORT_ERROR', {
        cause: error,
      });
    }
  }

  private decodeOutput(stage: PipelineStage, ctx: StagePromptContext, raw: string): DecodeResult {
    const { output } = stage;
    if (output.kind === 'artifacts') {
      return decodeResponse(raw, output.grammar, { logger: this.logger });
    }

    const body = unwrapFence(trimBlankLines(raw.replace(/\r\n?/g, '\n')));
    if (!body) {
      return { blocks: [], dropped: [] };
    }

    const content = output.frontmatter
      ? matter.stringify(`${body}\n`, {
          title: ctx.projectName,
          stage: stage.id,
          generated: new Date().toISOString(),
        })
      : `${body}\n`;

    return { blocks: [{ label: output.path(ctx), body: content, role: 'file' }], dropped: [] };
  }

  private outputGrammar(stage: PipelineStage): GrammarKind {
    return stage.output.kind === 'artifacts' ? stage.output.grammar : 'filename-block';
  }

  private progress(stage: PipelineStage, message: string): void {
    this.onProgress?.({ stage: stage.id, message });
  }
}
