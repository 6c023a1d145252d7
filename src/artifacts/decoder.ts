/**
 * Response Decoder
 *
 * Turns one raw LLM response into labelled blocks using a single pass over
 * its lines. A delimiter is only recognized at the start of a line, and a
 * block's body always stops at the next delimiter of the grammar, so one
 * malformed block can never swallow the blocks after it.
 */

import { createLogger, type Logger } from '../logger.js';
import { PipelineError } from '../errors.js';
import {
  ANGLE_MARKERS,
  getGrammar,
  type AngleGrammar,
  type BlockRole,
  type FencedGrammar,
  type GrammarKind,
  type MarkerKind,
  type NestedGrammar,
} from './grammar.js';
import { normalizeLabel } from './slug.js';

export interface ExtractedBlock {
  /** Slug for name-style grammars, relative path for path-style grammars */
  label: string;
  body: string;
  role: BlockRole;
  /** Slug of the enclosing feature (feature-component-integration only) */
  feature?: string;
}

export interface DroppedBlock {
  /** Label exactly as it appeared in the response */
  rawLabel: string;
  role: BlockRole | 'feature';
  reason: string;
}

export interface DecodeResult {
  blocks: ExtractedBlock[];
  dropped: DroppedBlock[];
}

export interface DecodeOptions {
  logger?: Logger;
}

const defaultLogger = createLogger('Decoder');

// Headings and bold markers are tolerated in front of a delimiter
const MARKER_LINE = /^[\s#*]*<<<\s*(COMPONENT|INTEGRATION|KEY_FEATURE|FEATURE|FILENAME)\b\s*:?(.*)$/i;
const CLOSE_LINE = /^\s*>>>\s*$/;
const FENCE_LINE = /^\s*(`{3,})(.*)$/;
const FILENAME_ATTR = /(?:^|\s)filename\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s`"']+))/i;

interface MarkerToken {
  kind: MarkerKind;
  label: string;
  /** Text after the closing `>>>` on the delimiter line */
  trailing: string;
}

interface OpenBlock {
  role: BlockRole;
  rawLabel: string;
  lines: string[];
}

interface OpenFence extends OpenBlock {
  ticks: number;
  depth: number;
}

interface FenceToken {
  ticks: number;
  info: string;
}

function matchMarker(line: string): MarkerToken | null {
  const match = MARKER_LINE.exec(line);
  if (!match) {
    return null;
  }

  const keyword = match[1].toUpperCase();
  const kind = ANGLE_MARKERS.find((marker) => marker === keyword);
  if (!kind) {
    return null;
  }

  const rest = match[2];
  const closeAt = rest.indexOf('>>>');
  if (closeAt === -1) {
    return { kind, label: rest.trim(), trailing: '' };
  }

  const trailing = rest.slice(closeAt + 3).trim();
  return {
    kind,
    label: rest.slice(0, closeAt).trim(),
    trailing: /^[*#]*$/.test(trailing) ? '' : trailing,
  };
}

function matchFence(line: string): FenceToken | null {
  const match = FENCE_LINE.exec(line);
  // Backticks in the info string mean inline code, not a fence
  if (!match || match[2].includes('`')) {
    return null;
  }
  return { ticks: match[1].length, info: match[2].trim() };
}

function extractFilename(info: string): string | undefined {
  const match = FILENAME_ATTR.exec(info);
  if (!match) {
    return undefined;
  }
  return match[1] ?? match[2] ?? match[3] ?? '';
}

/**
 * Drop leading blank lines and all trailing whitespace, keeping the
 * indentation of the first non-blank line.
 */
export function trimBlankLines(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd();
}

/**
 * Normalize a path label: trim it, drop surrounding quotes or backticks,
 * use `/` as the separator and strip trailing separators and a leading `./`.
 * A leading `/` is kept so that an absolute path stays recognizable.
 */
export function cleanPathLabel(raw: string): string {
  let label = raw
    .trim()
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim()
    .replace(/\\/g, '/')
    .replace(/\/+$/, '');

  while (label.startsWith('./')) {
    label = label.slice(2);
  }
  return label;
}

/**
 * If a body is exactly one fenced code block, return the code inside it.
 * Anything else is returned untouched.
 */
export function unwrapFence(body: string): string {
  const lines = body.split(/\r?\n/);
  if (lines.length < 2) {
    return body;
  }

  const open = matchFence(lines[0]);
  const close = matchFence(lines[lines.length - 1]);
  if (!open || !close || close.info !== '' || close.ticks < open.ticks) {
    return body;
  }

  let depth = 0;
  for (const line of lines.slice(1, -1)) {
    const fence = matchFence(line);
    if (!fence) {
      continue;
    }
    if (fence.info) {
      depth++;
    } else if (depth > 0) {
      depth--;
    } else if (fence.ticks >= open.ticks) {
      // The opening fence closes before the end: several blocks, not one
      return body;
    }
  }

  return trimBlankLines(lines.slice(1, -1).join('\n'));
}

function scanAngle(lines: string[], grammar: AngleGrammar): OpenBlock[] {
  const found: OpenBlock[] = [];
  let current: OpenBlock | null = null;

  for (const line of lines) {
    const marker = matchMarker(line);
    if (marker && grammar.boundaries.includes(marker.kind)) {
      if (current) {
        found.push(current);
      }
      const role = grammar.opens[marker.kind];
      current = role
        ? { role, rawLabel: marker.label, lines: marker.trailing ? [marker.trailing] : [] }
        : null;
      continue;
    }

    if (!current) {
      continue;
    }

    if (grammar.explicitClose && CLOSE_LINE.test(line)) {
      found.push(current);
      current = null;
      continue;
    }

    current.lines.push(line);
  }

  if (current) {
    found.push(current);
  }
  return found;
}

function scanFenced(lines: string[]): OpenBlock[] {
  const found: OpenBlock[] = [];
  let current: OpenFence | null = null;

  for (const line of lines) {
    const fence = matchFence(line);

    if (fence) {
      const filename = fence.info ? extractFilename(fence.info) : undefined;
      if (filename !== undefined) {
        // A new tagged fence always starts a new block, closed or not
        if (current) {
          found.push(current);
        }
        current = { role: 'file', rawLabel: filename, lines: [], ticks: fence.ticks, depth: 0 };
        continue;
      }

      if (!current) {
        continue;
      }

      if (fence.info) {
        current.depth++;
      } else if (current.depth > 0) {
        current.depth--;
      } else if (fence.ticks >= current.ticks) {
        found.push(current);
        current = null;
        continue;
      }
      current.lines.push(line);
      continue;
    }

    if (current) {
      current.lines.push(line);
    }
  }

  if (current) {
    found.push(current);
  }
  return found;
}

function toBlocks(
  open: OpenBlock[],
  grammar: AngleGrammar | FencedGrammar,
  result: DecodeResult
): void {
  for (const block of open) {
    let body = trimBlankLines(block.lines.join('\n'));

    if (grammar.labelStyle === 'path') {
      if (grammar.syntax === 'angle') {
        body = unwrapFence(body);
      }
      result.blocks.push({ label: cleanPathLabel(block.rawLabel), body, role: block.role });
      continue;
    }

    if (block.role === 'integration') {
      result.blocks.push({ label: 'integration', body, role: 'integration' });
      continue;
    }

    const label = normalizeLabel(block.rawLabel);
    if (!label) {
      result.dropped.push({ rawLabel: block.rawLabel, role: block.role, reason: 'label is empty after normalization' });
      continue;
    }
    result.blocks.push({ label, body, role: block.role });
  }
}

function decodeNested(lines: string[], grammar: NestedGrammar, result: DecodeResult): void {
  const inner = getGrammar(grammar.inner);
  if (inner.syntax !== 'angle') {
    throw new PipelineError(`Grammar '${grammar.kind}' needs an angle-delimited inner grammar`, 'UNKNOWN_GRAMMAR');
  }

  const preamble: string[] = [];
  const features: Array<{ rawLabel: string; lines: string[] }> = [];
  for (const line of lines) {
    const marker = matchMarker(line);
    if (marker?.kind === grammar.outer) {
      features.push({ rawLabel: marker.label, lines: marker.trailing ? [marker.trailing] : [] });
    } else if (features.length > 0) {
      features[features.length - 1].lines.push(line);
    } else {
      preamble.push(line);
    }
  }

  // Sections ahead of the first feature wrapper (or a reply with none) are
  // read as a flat plan
  toBlocks(scanAngle(preamble, inner), inner, result);
  if (features.length === 0) {
    return;
  }

  for (const feature of features) {
    const slug = normalizeLabel(feature.rawLabel);
    if (!slug) {
      result.dropped.push({ rawLabel: feature.rawLabel, role: 'feature', reason: 'label is empty after normalization' });
    }

    for (const block of scanAngle(feature.lines, inner)) {
      const body = trimBlankLines(block.lines.join('\n'));

      if (block.role === 'integration') {
        if (!slug) {
          result.dropped.push({
            rawLabel: feature.rawLabel,
            role: 'integration',
            reason: 'integration section belongs to an unnamed feature',
          });
          continue;
        }
        result.blocks.push({ label: slug, body, role: 'integration', feature: slug });
        continue;
      }

      const label = normalizeLabel(block.rawLabel);
      if (!label) {
        result.dropped.push({ rawLabel: block.rawLabel, role: block.role, reason: 'label is empty after normalization' });
        continue;
      }
      result.blocks.push(slug ? { label, body, role: block.role, feature: slug } : { label, body, role: block.role });
    }
  }
}

/**
 * Decode a raw response and report the blocks that had to be dropped.
 *
 * Never throws on malformed text: bad input yields fewer (or zero) blocks.
 * Throws only for an unknown grammar kind.
 */
export function decodeResponse(
  raw: string,
  grammar: GrammarKind,
  options: DecodeOptions = {}
): DecodeResult {
  const logger = options.logger ?? defaultLogger;
  const definition = getGrammar(grammar);
  const result: DecodeResult = { blocks: [], dropped: [] };

  if (raw.trim() === '') {
    logger.debug(`Empty response, nothing to decode (${grammar})`);
    return result;
  }

  const lines = raw.split(/\r?\n/);
  switch (definition.syntax) {
    case 'angle':
    case 'fence':
      toBlocks(definition.syntax === 'angle' ? scanAngle(lines, definition) : scanFenced(lines), definition, result);
      break;
    case 'nested':
      decodeNested(lines, definition, result);
      break;
  }

  for (const dropped of result.dropped) {
    logger.warn(`Dropped ${dropped.role} block '${dropped.rawLabel}': ${dropped.reason}`);
  }
  logger.debug(
    `Decoded ${result.blocks.length} block(s) with ${grammar}` +
      (result.dropped.length > 0 ? `, dropped ${result.dropped.length}` : '')
  );

  return result;
}

/**
 * Decode a raw response into its blocks.
 */
export function decode(raw: string, grammar: GrammarKind, options: DecodeOptions = {}): ExtractedBlock[] {
  return decodeResponse(raw, grammar, options).blocks;
}
