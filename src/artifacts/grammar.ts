/**
 * Delimiter grammars
 *
 * Each grammar describes how one LLM response is carved into labelled
 * blocks:
 * - component-integration:          <<<COMPONENT: name>>> ... <<<INTEGRATION>>> ...
 * - feature-component-integration:  <<<FEATURE: name>>> wrapping the above
 * - key-feature:                    <<<KEY_FEATURE: name>>> ...
 * - filename-block:                 <<<FILENAME: path>>> ... >>>
 * - fenced-filename:                ```lang filename=path ... ```
 */

import { PipelineError } from '../errors.js';

export type GrammarKind =
  | 'component-integration'
  | 'feature-component-integration'
  | 'key-feature'
  | 'filename-block'
  | 'fenced-filename';

/** Keyword that follows `<<<` in an angle delimiter */
export type MarkerKind = 'COMPONENT' | 'INTEGRATION' | 'FEATURE' | 'KEY_FEATURE' | 'FILENAME';

/** What a decoded block becomes once it is materialized */
export type BlockRole = 'component' | 'integration' | 'key-feature' | 'file';

/**
 * `name` labels are free text and get slug-normalized; `path` labels are
 * the destination path, kept as written.
 */
export type LabelStyle = 'name' | 'path';

export const ANGLE_MARKERS: readonly MarkerKind[] = [
  'COMPONENT',
  'INTEGRATION',
  'FEATURE',
  'KEY_FEATURE',
  'FILENAME',
];

export interface AngleGrammar {
  kind: GrammarKind;
  syntax: 'angle';
  labelStyle: LabelStyle;
  description: string;
  /** Markers that open a block this grammar emits */
  opens: Partial<Record<MarkerKind, BlockRole>>;
  /** Markers that end the body currently being collected */
  boundaries: readonly MarkerKind[];
  /** Whether a line holding only `>>>` closes the current block */
  explicitClose: boolean;
}

export interface NestedGrammar {
  kind: GrammarKind;
  syntax: 'nested';
  labelStyle: 'name';
  description: string;
  outer: MarkerKind;
  inner: GrammarKind;
}

export interface FencedGrammar {
  kind: GrammarKind;
  syntax: 'fence';
  labelStyle: 'path';
  description: string;
}

export type GrammarDefinition = AngleGrammar | NestedGrammar | FencedGrammar;

export const GRAMMARS: Readonly<Record<GrammarKind, GrammarDefinition>> = {
  'component-integration': {
    kind: 'component-integration',
    syntax: 'angle',
    labelStyle: 'name',
    description: 'Component plans followed by an optional integration section',
    opens: { COMPONENT: 'component', INTEGRATION: 'integration' },
    boundaries: ANGLE_MARKERS,
    explicitClose: true,
  },
  'feature-component-integration': {
    kind: 'feature-component-integration',
    syntax: 'nested',
    labelStyle: 'name',
    description: 'Features, each wrapping component plans and one integration section',
    outer: 'FEATURE',
    inner: 'component-integration',
  },
  'key-feature': {
    kind: 'key-feature',
    syntax: 'angle',
    labelStyle: 'name',
    description: 'Key feature write-ups',
    opens: { KEY_FEATURE: 'key-feature' },
    boundaries: ANGLE_MARKERS,
    explicitClose: true,
  },
  'filename-block': {
    kind: 'filename-block',
    syntax: 'angle',
    labelStyle: 'path',
    description: 'Files introduced by <<<FILENAME: path and closed by >>>',
    opens: { FILENAME: 'file' },
    boundaries: ['FILENAME'],
    explicitClose: true,
  },
  'fenced-filename': {
    kind: 'fenced-filename',
    syntax: 'fence',
    labelStyle: 'path',
    description: 'Markdown code fences tagged with filename=path',
  },
};

const GRAMMAR_KINDS = new Set<string>(Object.keys(GRAMMARS));

export function isGrammarKind(value: string): value is GrammarKind {
  return GRAMMAR_KINDS.has(value);
}

/**
 * Look up a grammar definition, failing fast on an unknown kind.
 */
export function getGrammar(kind: string): GrammarDefinition {
  if (!isGrammarKind(kind)) {
    throw new PipelineError(
      `Unknown grammar '${kind}'. Expected one of: ${[...GRAMMAR_KINDS].join(', ')}`,
      'UNKNOWN_GRAMMAR'
    );
  }
  return GRAMMARS[kind];
}
