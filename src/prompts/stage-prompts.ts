/**
 * Prompts for the pipeline stages.
 *
 * Each prompt ends with the exact output format the stage decodes. The
 * format sections are the contract with the response decoder: if one
 * changes, the matching grammar in artifacts/grammar.ts must change too.
 */

export interface StagePromptContext {
  projectName: string;
  /** Idea text, or the subject of an idea list */
  idea?: string;
  /** Requested changes (update-idea) */
  instructions?: string;
  /** Document type (generate-docs only) */
  docType?: string;
  /** Ideas to produce (generate-ideas) */
  ideaCount?: number;
  /** File name of the idea list, without extension (generate-ideas) */
  listName?: string;
  /** Input documents, already wrapped in their content envelopes */
  inputs: string;
}

const KEY_FEATURE_FORMAT = `
## Output Format
Write one section per key feature. Start every section on its own line with:

<<<KEY_FEATURE: feature name>>>

followed by the feature description in Markdown. Do not write anything before the first section.
`;

const ARCHITECTURE_FORMAT = `
## Output Format
Group the plan by feature. Every delimiter must start its own line.

<<<FEATURE: feature name>>>
<<<COMPONENT: component name>>>
Implementation plan for this component of the feature, in Markdown.
>>>
<<<INTEGRATION>>>
How the components of this feature connect: interfaces, data flow, startup order.
>>>

Repeat COMPONENT sections as needed, and write one INTEGRATION section per feature.
`;

const FENCED_FILE_FORMAT = `
## Output Format
Write every file as a fenced code block whose info string names the file:

\`\`\`python filename=src/app/main.py
# file content
\`\`\`

Paths are relative to the project root and must include an extension (Dockerfile and similar names excepted).
Only fenced blocks with a filename are kept.
`;

const FILENAME_BLOCK_FORMAT = `
## Output Format
Write every file as a delimited block:

<<<FILENAME: relative/path/to/file.ext>>>
file content
>>>

Paths are relative to the project root. Never use absolute paths or \`..\`.
`;

const DOCUMENT_FORMAT = `
## Output Format
Reply with the Markdown document only, without a surrounding code fence.
`;

function section(title: string, body: string | undefined): string {
  return body ? `## ${title}\n\n${body}\n` : '';
}

export function buildExpandIdeaPrompt(ctx: StagePromptContext): string {
  return `
# Idea Expansion

Turn the idea below into a product concept for the project "${ctx.projectName}".
Cover the problem it solves, the target users, the main capabilities, technical constraints and open risks.

${section('Idea', ctx.idea)}
${DOCUMENT_FORMAT}`;
}

export function buildUpdateIdeaPrompt(ctx: StagePromptContext): string {
  return `
# Idea Update

Revise the product concept of "${ctx.projectName}" below according to the requested changes.
Keep every section the changes do not touch, and return the complete revised concept.

${section('Requested Changes', ctx.instructions)}
${section('Current Concept', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildGenerateIdeasPrompt(ctx: StagePromptContext): string {
  const count = ctx.ideaCount ?? 10;

  return `
# Idea List

Generate ${count} distinct product ideas in the field of: ${ctx.idea ?? ''}

Each idea must be buildable by a small team and describe its core concept, key features, benefits and
target audience. Spread the ideas over different use cases and give each one a category.

## Output Format
Reply with JSON only, in exactly this shape, numbering the ids from 1 to ${count}:

{
  "ideas": [
    { "id": 1, "category": "Education", "title": "short title", "description": "one paragraph" }
  ]
}
`;
}

export function buildAnalyzeBusinessPrompt(ctx: StagePromptContext): string {
  return `
# Business Analysis

Evaluate the concept below from a business perspective. For each category list the strengths and the weaknesses:

1. Market opportunity and need
2. Value proposition and differentiation
3. Monetization strategy and potential
4. Required investment and financials
5. Technical feasibility and challenges
6. Scalability and growth potential
7. Team and execution
8. Key risks and barriers to entry

Close with an overall conclusion naming the factors that weigh most for and against pursuing the idea.

${section('Project Documents', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildAnalyzeMarketPrompt(ctx: StagePromptContext): string {
  return `
# Market Analysis

Write a market analysis report for the concept below with these sections:

1. Target market and audience: primary and secondary markets, estimated size, underserved segments
2. Competitive landscape: existing competitors or alternatives, their strengths and weaknesses, and this idea's differentiator
3. Business potential and monetization: overall potential, candidate revenue models, barriers to entry
4. Strategic recommendations: features or pivots that raise the idea's value, and useful partnerships

${section('Project Documents', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildResearchPrompt(ctx: StagePromptContext): string {
  return `
# Technical Research

Identify the key technical areas of the concept below (storage, integrations, UI, algorithms, deployment).
For 5 to 10 relevant resources (articles, documentation, well-known projects) give a title, a URL or
"general knowledge", and a summary of the technologies, implementation notes, architecture and trade-offs.
Finish with a synthesis of the most promising approaches for this project.

${section('Project Documents', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildExtractFeaturesPrompt(ctx: StagePromptContext): string {
  return `
# Key Feature Extraction

Read the project concept and list its key features. For each one describe the user-facing behaviour,
the data involved and how success is measured. Prefer 3 to 8 features that can be built independently.

${section('Project Documents', ctx.inputs)}
${KEY_FEATURE_FORMAT}`;
}

export function buildPlanArchitecturePrompt(ctx: StagePromptContext): string {
  return `
# Architecture Plan

You are the software architect for "${ctx.projectName}". For each key feature, split the work into
components (for example backend, frontend, database, worker) and write an implementation plan for each:
modules, endpoints or screens, data models, libraries and error handling.
Give every component a name that is unique across the whole plan (for example "accounts api" and "billing api"):
each component plan is stored under its own name.

${section('Project Documents', ctx.inputs)}
${ARCHITECTURE_FORMAT}`;
}

export function buildGenerateCodePrompt(ctx: StagePromptContext): string {
  return `
# Code Generation

Implement the project from the plans below. Produce complete, runnable files: no placeholders,
no elided sections. Include dependency manifests and configuration files the code needs.
Follow the integration plans for how the components talk to each other.

${section('Plans', ctx.inputs)}
${FENCED_FILE_FORMAT}`;
}

export function buildGenerateTestsPrompt(ctx: StagePromptContext): string {
  return `
# Test Generation

Write automated tests for the source code below, using the test framework that fits each component's language.
Cover the main behaviour of every module and the error paths named in the plans. Put tests under \`tests/\`.

${section('Plans and Source', ctx.inputs)}
${FILENAME_BLOCK_FORMAT}`;
}

export function buildReviewCodePrompt(ctx: StagePromptContext): string {
  return `
# Code Review

Review the source code against the implementation plans. Report bugs, missing features, security problems,
broken integration between components and missing configuration. For each finding name the file, describe
the problem and state the fix. End with a prioritized list of changes.

${section('Plans and Source', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildFixCodePrompt(ctx: StagePromptContext): string {
  return `
# Code Fixes

Apply the fixes from the code review to the project. Write every file you change in full; files you do
not change can be left out. Keep the structure described in the implementation plans.

${section('Review, Plans and Source', ctx.inputs)}
${FENCED_FILE_FORMAT}`;
}

const DOC_TYPE_BRIEFS: Record<string, string> = {
  project_docs: 'a project overview: purpose, architecture summary, setup, configuration and how to run it',
  srs: 'a software requirements specification: scope, functional and non-functional requirements, constraints',
  api_docs: 'API documentation: every endpoint or public interface with parameters, responses and errors',
  user_manual: 'a user manual: installation, first steps, everyday tasks and troubleshooting',
  sdd: 'a software design description: components, data design, interfaces and key design decisions',
};

export function buildGenerateDocsPrompt(ctx: StagePromptContext): string {
  const docType = ctx.docType ?? 'project_docs';
  const brief = DOC_TYPE_BRIEFS[docType] ?? docType;

  return `
# Documentation

Write ${brief} for "${ctx.projectName}", based on the concept, plans and source below.

${section('Project Documents and Source', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export function buildGenerateDiagramsPrompt(ctx: StagePromptContext): string {
  return `
# Diagrams

Create Mermaid diagrams for the project: a component diagram, a sequence diagram for the main user flow
and an entity-relationship diagram for the data model. Store each diagram under \`diagrams/\` with the
\`.mdd\` extension; the block content is the Mermaid source only.

${section('Project Documents and Source', ctx.inputs)}
${FILENAME_BLOCK_FORMAT}`;
}

export function buildPlanTasksPrompt(ctx: StagePromptContext): string {
  return `
# Implementation Tasks

Break the implementation plans into ordered development tasks. Each task gets its own Markdown file
\`tasks/task_NN_short_name.md\` with a goal, the steps, the files it touches and acceptance criteria.

${section('Implementation Plans', ctx.inputs)}
${FILENAME_BLOCK_FORMAT}`;
}

export function buildScorePrompt(ctx: StagePromptContext): string {
  return `
# Viability Score

Score the project concept and its features (and the business analysis, when there is one) from 1 to 10 in each category, then give the weighted total:

1. Market opportunity and need (20%)
2. Value proposition and differentiation (20%)
3. Monetization potential (15%)
4. Required investment (10%)
5. Technical feasibility (10%)
6. Competitive landscape (10%)
7. Execution risk (15%)

Give a one-paragraph justification per category and a final table.

${section('Project Documents', ctx.inputs)}
${DOCUMENT_FORMAT}`;
}

export const DOC_TYPES = ['project_docs', 'srs', 'api_docs', 'user_manual', 'sdd'] as const;

export type DocType = (typeof DOC_TYPES)[number];

export function isDocType(value: string): value is DocType {
  return DOC_TYPES.some((docType) => docType === value);
}
