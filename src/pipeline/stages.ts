import { PipelineError } from '../errors.js';
import type { GrammarKind } from '../artifacts/grammar.js';
import {
  buildAnalyzeBusinessPrompt,
  buildAnalyzeMarketPrompt,
  buildExpandIdeaPrompt,
  buildExtractFeaturesPrompt,
  buildFixCodePrompt,
  buildGenerateCodePrompt,
  buildGenerateDiagramsPrompt,
  buildGenerateDocsPrompt,
  buildGenerateIdeasPrompt,
  buildGenerateTestsPrompt,
  buildPlanArchitecturePrompt,
  buildPlanTasksPrompt,
  buildResearchPrompt,
  buildReviewCodePrompt,
  buildScorePrompt,
  buildUpdateIdeaPrompt,
  type StagePromptContext,
} from '../prompts/stage-prompts.js';

export const STAGE_IDS = [
  'generate-ideas',
  'expand-idea',
  'update-idea',
  'analyze-business',
  'analyze-market',
  'research',
  'extract-features',
  'plan-architecture',
  'generate-code',
  'review-code',
  'fix-code',
  'generate-tests',
  'generate-docs',
  'generate-diagrams',
  'plan-tasks',
  'score',
] as const;

export type StageId = (typeof STAGE_IDS)[number];

export interface StageInputGroup {
  /** Globs relative to the project root, read in this order */
  patterns: readonly string[];
  /** A required group with no matching file stops the stage */
  required: boolean;
}

export type StageOutput =
  | { kind: 'artifacts'; grammar: GrammarKind }
  | {
      kind: 'document';
      /** Project-relative path of the single document the stage writes */
      path: (ctx: StagePromptContext) => string;
      /** Prepend title/stage/generated frontmatter */
      frontmatter: boolean;
    };

export interface PipelineStage {
  id: StageId;
  title: string;
  inputs: readonly StageInputGroup[];
  requiresIdea?: boolean;
  requiresInstructions?: boolean;
  requiresDocType?: boolean;
  output: StageOutput;
  buildPrompt: (ctx: StagePromptContext) => string;
}

const IDEA = ['docs/idea.md'];
const PLAN_DOCS = ['docs/integ*.md', 'docs/impl_*.md'];
const SOURCES = ['src/**/*'];

export const PIPELINE_STAGES: Readonly<Record<StageId, PipelineStage>> = {
  'generate-ideas': {
    id: 'generate-ideas',
    title: 'Generating ideas',
    inputs: [],
    requiresIdea: true,
    output: { kind: 'document', path: (ctx) => `${ctx.listName ?? 'ideas'}.json`, frontmatter: false },
    buildPrompt: buildGenerateIdeasPrompt,
  },
  'expand-idea': {
    id: 'expand-idea',
    title: 'Expanding idea',
    inputs: [],
    requiresIdea: true,
    output: { kind: 'document', path: () => 'docs/idea.md', frontmatter: true },
    buildPrompt: buildExpandIdeaPrompt,
  },
  'update-idea': {
    id: 'update-idea',
    title: 'Updating idea',
    inputs: [{ patterns: IDEA, required: true }],
    requiresInstructions: true,
    output: { kind: 'document', path: () => 'docs/idea.md', frontmatter: true },
    buildPrompt: buildUpdateIdeaPrompt,
  },
  'analyze-business': {
    id: 'analyze-business',
    title: 'Analyzing business case',
    inputs: [{ patterns: IDEA, required: true }],
    output: { kind: 'document', path: () => 'docs/business.md', frontmatter: true },
    buildPrompt: buildAnalyzeBusinessPrompt,
  },
  'analyze-market': {
    id: 'analyze-market',
    title: 'Analyzing market',
    inputs: [{ patterns: IDEA, required: true }],
    output: { kind: 'document', path: () => 'docs/market_analysis.md', frontmatter: true },
    buildPrompt: buildAnalyzeMarketPrompt,
  },
  research: {
    id: 'research',
    title: 'Researching technologies',
    inputs: [{ patterns: IDEA, required: true }],
    output: { kind: 'document', path: () => 'docs/research_summary.md', frontmatter: true },
    buildPrompt: buildResearchPrompt,
  },
  'extract-features': {
    id: 'extract-features',
    title: 'Extracting key features',
    inputs: [{ patterns: IDEA, required: true }],
    output: { kind: 'artifacts', grammar: 'key-feature' },
    buildPrompt: buildExtractFeaturesPrompt,
  },
  'plan-architecture': {
    id: 'plan-architecture',
    title: 'Planning architecture',
    inputs: [
      { patterns: IDEA, required: true },
      { patterns: ['docs/feature_*.md'], required: false },
    ],
    output: { kind: 'artifacts', grammar: 'feature-component-integration' },
    buildPrompt: buildPlanArchitecturePrompt,
  },
  'generate-code': {
    id: 'generate-code',
    title: 'Generating code',
    inputs: [{ patterns: PLAN_DOCS, required: true }],
    output: { kind: 'artifacts', grammar: 'fenced-filename' },
    buildPrompt: buildGenerateCodePrompt,
  },
  'review-code': {
    id: 'review-code',
    title: 'Reviewing code',
    inputs: [
      { patterns: ['docs/impl_*.md'], required: true },
      { patterns: ['docs/integ*.md'], required: false },
      { patterns: SOURCES, required: true },
    ],
    output: { kind: 'document', path: () => 'docs/review.md', frontmatter: true },
    buildPrompt: buildReviewCodePrompt,
  },
  'fix-code': {
    id: 'fix-code',
    title: 'Fixing code',
    inputs: [
      { patterns: ['docs/review.md'], required: true },
      { patterns: PLAN_DOCS, required: true },
      { patterns: SOURCES, required: false },
    ],
    output: { kind: 'artifacts', grammar: 'fenced-filename' },
    buildPrompt: buildFixCodePrompt,
  },
  'generate-tests': {
    id: 'generate-tests',
    title: 'Generating tests',
    inputs: [
      { patterns: PLAN_DOCS, required: false },
      { patterns: SOURCES, required: true },
    ],
    output: { kind: 'artifacts', grammar: 'filename-block' },
    buildPrompt: buildGenerateTestsPrompt,
  },
  'generate-docs': {
    id: 'generate-docs',
    title: 'Writing documentation',
    inputs: [
      { patterns: IDEA, required: true },
      { patterns: ['docs/impl_*.md'], required: false },
      { patterns: SOURCES, required: false },
    ],
    requiresDocType: true,
    output: { kind: 'document', path: (ctx) => `docs/${ctx.docType ?? 'project_docs'}.md`, frontmatter: true },
    buildPrompt: buildGenerateDocsPrompt,
  },
  'generate-diagrams': {
    id: 'generate-diagrams',
    title: 'Drawing diagrams',
    inputs: [
      { patterns: ['docs/*.md'], required: true },
      { patterns: SOURCES, required: false },
    ],
    output: { kind: 'artifacts', grammar: 'filename-block' },
    buildPrompt: buildGenerateDiagramsPrompt,
  },
  'plan-tasks': {
    id: 'plan-tasks',
    title: 'Planning tasks',
    inputs: [{ patterns: ['docs/impl_*.md'], required: true }],
    output: { kind: 'artifacts', grammar: 'filename-block' },
    buildPrompt: buildPlanTasksPrompt,
  },
  score: {
    id: 'score',
    title: 'Scoring',
    inputs: [
      { patterns: IDEA, required: true },
      { patterns: ['docs/business.md'], required: false },
      { patterns: ['docs/feature_*.md'], required: false },
    ],
    output: { kind: 'document', path: () => 'docs/scoring.md', frontmatter: true },
    buildPrompt: buildScorePrompt,
  },
};

export function isStageId(value: string): value is StageId {
  return STAGE_IDS.some((id) => id === value);
}

export function getStage(id: string): PipelineStage {
  if (!isStageId(id)) {
    throw new PipelineError(`Unknown stage '${id}'. Expected one of: ${STAGE_IDS.join(', ')}`, 'UNKNOWN_STAGE');
  }
  return PIPELINE_STAGES[id];
}
