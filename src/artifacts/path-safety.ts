import * as path from 'path';
import type { LabelStyle } from './grammar.js';

/**
 * Extensionless file names that are accepted below the project root.
 * Override with the `extensionlessFiles` config key.
 */
export const DEFAULT_EXTENSIONLESS_FILES: readonly string[] = [
  '.gitignore',
  '.dockerignore',
  '.editorconfig',
  '.env',
  '.npmrc',
  '.nvmrc',
  'Dockerfile',
  'Containerfile',
  'Makefile',
  'Procfile',
  'Jenkinsfile',
  'Gemfile',
  'Rakefile',
  'Vagrantfile',
  'LICENSE',
  'CODEOWNERS',
];

export type PathRejectionKind = 'unsafe-path' | 'implausible-path';

export type PathCheck =
  | { ok: true; path: string }
  | { ok: false; kind: PathRejectionKind; reason: string };

export interface PathCheckOptions {
  /** Path-style labels also get the extension plausibility check */
  labelStyle: LabelStyle;
  extensionlessFiles?: readonly string[];
}

function reject(kind: PathRejectionKind, reason: string): PathCheck {
  return { ok: false, kind, reason };
}

/**
 * Validate a candidate artifact path and return it in canonical form
 * (POSIX separators, no empty or `.` segments).
 *
 * Rejections, in the order they are checked:
 * - `invalid characters`: contains a NUL byte
 * - `empty path`: nothing left once separators are trimmed
 * - `absolute path`: leading `/` or `\`, or a drive letter
 * - `path traversal`: any `..` segment
 * - `implausible filename (no extension)`: path-style only, see below
 *
 * A final segment with no `.` anywhere is taken for a directory the model
 * mislabelled, unless it is allow-listed or the only segment. Dotfiles such
 * as `.prettierrc` count as named files.
 */
export function validateArtifactPath(candidate: string, options: PathCheckOptions): PathCheck {
  const trimmed = candidate.trim();
  if (trimmed.includes('\0')) {
    return reject('unsafe-path', 'invalid characters');
  }

  const normalized = trimmed.replace(/\\/g, '/');
  const segments = normalized.split('/').filter((segment) => segment !== '' && segment !== '.');

  if (segments.length === 0) {
    return reject('unsafe-path', 'empty path');
  }
  if (normalized.startsWith('/') || /^[A-Za-z]:/.test(normalized)) {
    return reject('unsafe-path', 'absolute path');
  }
  if (segments.includes('..')) {
    return reject('unsafe-path', 'path traversal');
  }

  if (options.labelStyle === 'path') {
    const fileName = segments[segments.length - 1];
    const allowList = (options.extensionlessFiles ?? DEFAULT_EXTENSIONLESS_FILES).map((name) => name.toLowerCase());

    if (
      !fileName.includes('.') &&
      segments.length > 1 &&
      !allowList.includes(fileName.toLowerCase())
    ) {
      return reject('implausible-path', 'implausible filename (no extension)');
    }
  }

  return { ok: true, path: segments.join('/') };
}

/**
 * True when `target` lies strictly inside `root` (both absolute).
 */
export function isInsideRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative !== '' && relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative);
}

/**
 * Translate a validated POSIX artifact path to a host path under `root`.
 */
export function toHostPath(root: string, artifactPath: string): string {
  return path.resolve(root, ...artifactPath.split('/'));
}
