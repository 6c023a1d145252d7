/**
 * Artifact Materializer
 *
 * Writes decoded blocks into a project directory. Every path is validated
 * before anything touches the disk, and each artifact is written on its own:
 * a failure is recorded in the report and the batch moves on. The only
 * error thrown is for a project root that cannot hold files at all.
 */

import { lstat, mkdir, realpath, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import { createLogger, type Logger } from '../logger.js';
import { PipelineError, describeFsError, hasErrorCode } from '../errors.js';
import { getGrammar, type GrammarKind } from './grammar.js';
import type { ExtractedBlock } from './decoder.js';
import { isInsideRoot, toHostPath, validateArtifactPath, type PathRejectionKind } from './path-safety.js';
import { normalizeLabel } from './slug.js';

export type FailureKind = PathRejectionKind | 'write-failure';

export interface FailedArtifact {
  path: string;
  reason: string;
  kind: FailureKind;
}

export interface WriteReport {
  /** Relative POSIX paths, in the order the decoder produced them */
  written: string[];
  failed: FailedArtifact[];
}

export type StageOutcome = 'success' | 'partial' | 'failed';

export interface MaterializeOptions {
  /** Allow-list for extensionless file names (path-style grammars) */
  extensionlessFiles?: readonly string[];
  logger?: Logger;
}

type PlannedArtifact =
  | { status: 'accepted'; path: string; content: string }
  | { status: 'rejected'; failure: FailedArtifact };

const defaultLogger = createLogger('Materializer');

const ESCAPE_REASON = 'path escapes project root';

/**
 * Destination path for a block before validation. Name-style blocks go
 * through a fixed template under `docs/`; path-style blocks use their label.
 * A name that normalizes to nothing yields `''`, which validation rejects.
 */
export function resolveArtifactPath(block: ExtractedBlock, grammar: GrammarKind): string {
  if (getGrammar(grammar).labelStyle === 'path' || block.role === 'file') {
    return block.label;
  }

  switch (block.role) {
    case 'component': {
      const slug = normalizeLabel(block.label);
      return slug ? `docs/impl_${slug}.md` : '';
    }
    case 'integration': {
      if (block.feature === undefined) {
        return 'docs/integ.md';
      }
      const slug = normalizeLabel(block.feature);
      return slug ? `docs/integ_${slug}.md` : '';
    }
    case 'key-feature': {
      const slug = normalizeLabel(block.label);
      return slug ? `docs/feature_${slug}.md` : '';
    }
  }
}

/**
 * Decide what a stage's report means for the pipeline: nothing written is a
 * failure, something written next to failures is a partial success.
 */
export function classifyReport(report: WriteReport): StageOutcome {
  if (report.written.length === 0) {
    return 'failed';
  }
  return report.failed.length > 0 ? 'partial' : 'success';
}

async function prepareRoot(projectRoot: string): Promise<string> {
  const root = path.resolve(projectRoot);

  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new PipelineError(`Project root is not a directory: ${root}`, 'PRECONDITION_FAILED');
    }
  } catch (error) {
    if (PipelineError.isPipelineError(error)) {
      throw error;
    }
    if (!hasErrorCode(error, 'ENOENT')) {
      throw new PipelineError(`Cannot access project root ${root}: ${describeFsError(error)}`, 'PRECONDITION_FAILED', {
        cause: error,
      });
    }
    try {
      await mkdir(root, { recursive: true });
    } catch (mkdirError) {
      throw new PipelineError(`Cannot create project root ${root}: ${describeFsError(mkdirError)}`, 'PRECONDITION_FAILED', {
        cause: mkdirError,
      });
    }
  }

  return realpath(root);
}

/**
 * Real path of the closest ancestor of `dir` that exists.
 */
async function existingAncestor(dir: string): Promise<string> {
  let current = dir;
  for (;;) {
    try {
      return await realpath(current);
    } catch (error) {
      const parent = path.dirname(current);
      if (!hasErrorCode(error, 'ENOENT') || parent === current) {
        throw error;
      }
      current = parent;
    }
  }
}

function contained(realRoot: string, target: string): boolean {
  return target === realRoot || isInsideRoot(realRoot, target);
}

/**
 * Write one artifact. Resolves to `null` on success or the failure to record.
 */
async function writeArtifact(realRoot: string, artifactPath: string, content: string): Promise<FailedArtifact | null> {
  const target = toHostPath(realRoot, artifactPath);
  const parent = path.dirname(target);

  try {
    // Symlinks inside the project must not lead the write outside it
    if (!contained(realRoot, await existingAncestor(parent))) {
      return { path: artifactPath, reason: ESCAPE_REASON, kind: 'unsafe-path' };
    }

    await mkdir(parent, { recursive: true });

    const existing = await lstat(target).catch((error: unknown) => {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    });
    if (existing?.isSymbolicLink()) {
      const linked = await realpath(target).catch(() => null);
      if (linked === null || !isInsideRoot(realRoot, linked)) {
        return { path: artifactPath, reason: ESCAPE_REASON, kind: 'unsafe-path' };
      }
    }

    await writeFile(target, content, 'utf-8');
    return null;
  } catch (error) {
    return { path: artifactPath, reason: describeFsError(error), kind: 'write-failure' };
  }
}

/**
 * Validate, deduplicate and write a batch of decoded blocks under
 * `projectRoot`.
 *
 * Duplicate paths: the last block's content wins and the artifact keeps the
 * position of its first occurrence.
 *
 * @throws PipelineError `PRECONDITION_FAILED` when the root is not a
 *   directory or cannot be created
 */
export async function materialize(
  blocks: readonly ExtractedBlock[],
  grammar: GrammarKind,
  projectRoot: string,
  options: MaterializeOptions = {}
): Promise<WriteReport> {
  const logger = options.logger ?? defaultLogger;
  const { labelStyle } = getGrammar(grammar);
  const realRoot = await prepareRoot(projectRoot);

  const plan: PlannedArtifact[] = [];
  const accepted = new Map<string, number>();

  for (const block of blocks) {
    const candidate = resolveArtifactPath(block, grammar);
    const check = validateArtifactPath(candidate, {
      labelStyle,
      extensionlessFiles: options.extensionlessFiles,
    });

    if (!check.ok) {
      const shown = candidate || block.label;
      logger.warn(`Skipping '${shown}': ${check.reason}`);
      plan.push({ status: 'rejected', failure: { path: shown, reason: check.reason, kind: check.kind } });
      continue;
    }

    const index = accepted.get(check.path);
    if (index !== undefined) {
      logger.warn(`'${check.path}' was produced more than once; keeping the last version`);
      plan[index] = { status: 'accepted', path: check.path, content: block.body };
      continue;
    }

    accepted.set(check.path, plan.length);
    plan.push({ status: 'accepted', path: check.path, content: block.body });
  }

  const report: WriteReport = { written: [], failed: [] };

  for (const entry of plan) {
    if (entry.status === 'rejected') {
      report.failed.push(entry.failure);
      continue;
    }

    const failure = await writeArtifact(realRoot, entry.path, entry.content);
    if (failure) {
      logger.error(`Failed to write ${failure.path}: ${failure.reason}`);
      report.failed.push(failure);
    } else {
      logger.info(`✓ Wrote ${entry.path}`);
      report.written.push(entry.path);
    }
  }

  logger.debug(
    `Materialized ${report.written.length}/${plan.length} artifact(s) into ${realRoot}` +
      (report.failed.length > 0 ? ` (${report.failed.length} failed)` : '')
  );

  return report;
}

/**
 * One-line summary of a report, used in stage logs and CLI output.
 */
export function summarizeReport(report: WriteReport): string {
  const parts = [`${report.written.length} written`];
  if (report.failed.length > 0) {
    parts.push(`${report.failed.length} failed`);
  }
  return parts.join(', ');
}
