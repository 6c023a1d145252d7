/**
 * Project workspace helpers: where projects live, their standard layout,
 * and gathering the documents a stage reads as its prompt context.
 */

import * as fs from 'fs';
import { mkdir, readdir, readFile, stat } from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import matter from 'gray-matter';
import { PipelineError, describeFsError, hasErrorCode } from './errors.js';
import { projectSlug } from './artifacts/slug.js';
import { createLogger, type Logger } from './logger.js';

export const PROJECT_DIRECTORIES = ['docs', 'src', 'tests'] as const;

/** Files larger than this are left out of prompt context */
export const MAX_INPUT_BYTES = 200 * 1024;

const IGNORED_INPUTS = ['**/node_modules/**', '**/.git/**', '**/__pycache__/**', '**/.venv/**', '**/dist/**'];

export interface InputDocument {
  /** Path relative to the project root, POSIX separators */
  path: string;
  content: string;
}

const defaultLogger = createLogger('Project');

/**
 * Absolute path of a named project inside `projectsDir`.
 */
export function projectPath(projectsDir: string, name: string): string {
  const trimmed = name.trim();
  if (!trimmed || trimmed === '.' || trimmed === '..' || /[\\/]/.test(trimmed)) {
    throw new PipelineError(`Invalid project name '${name}'`, 'PRECONDITION_FAILED');
  }
  return path.resolve(projectsDir, trimmed);
}

/**
 * Project name derived from the idea text when none is given.
 */
export function projectNameFromIdea(idea: string): string {
  const slug = projectSlug(idea);
  return slug || `project-${Date.now()}`;
}

export function projectExists(projectRoot: string): boolean {
  return fs.existsSync(projectRoot) && fs.statSync(projectRoot).isDirectory();
}

/**
 * Create the standard `docs/`, `src/` and `tests/` directories.
 */
export async function ensureProjectStructure(projectRoot: string, logger: Logger = defaultLogger): Promise<void> {
  try {
    for (const dir of PROJECT_DIRECTORIES) {
      await mkdir(path.join(projectRoot, dir), { recursive: true });
    }
    logger.debug(`Standard directories ensured for ${path.basename(projectRoot)}`);
  } catch (error) {
    throw new PipelineError(`Failed to create project structure at ${projectRoot}: ${describeFsError(error)}`, 'PRECONDITION_FAILED', {
      cause: error,
    });
  }
}

/**
 * Names of the projects in `projectsDir`, sorted. A missing directory has
 * no projects.
 */
export async function listProjects(projectsDir: string): Promise<string[]> {
  try {
    const entries = await readdir(projectsDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}

/**
 * Read every file matching `patterns` under the project root. Patterns are
 * applied in order and a file is only read once, so earlier patterns put
 * their files first. Markdown frontmatter is stripped.
 */
export async function collectInputs(
  projectRoot: string,
  patterns: readonly string[],
  logger: Logger = defaultLogger
): Promise<InputDocument[]> {
  const documents: InputDocument[] = [];
  const seen = new Set<string>();

  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd: projectRoot, nodir: true, posix: true, ignore: IGNORED_INPUTS });

    for (const relativePath of matches.sort()) {
      if (seen.has(relativePath)) {
        continue;
      }
      seen.add(relativePath);

      const absolutePath = path.join(projectRoot, relativePath);
      const { size } = await stat(absolutePath);
      if (size > MAX_INPUT_BYTES) {
        logger.warn(`Skipping ${relativePath}: ${size} bytes is over the ${MAX_INPUT_BYTES} byte input limit`);
        continue;
      }

      const raw = await readFile(absolutePath, 'utf-8');
      const content = relativePath.endsWith('.md') ? matter(raw).content.trim() : raw.trimEnd();
      documents.push({ path: relativePath, content });
    }
  }

  return documents;
}

/**
 * Join input documents into one prompt section, each in its own envelope.
 */
export function formatInputs(documents: readonly InputDocument[]): string {
  return documents
    .map((doc) => `# --- Content from: ${doc.path} ---\n\n${doc.content}\n\n# --- End of: ${doc.path} ---`)
    .join('\n\n');
}
