export * from './artifacts/index.js';
export { PipelineError, type PipelineErrorCode } from './errors.js';
export { createLogger, silentLogger, setVerbose, type Logger } from './logger.js';
export { ConfigManager, ConfigSchema, type Config, type ConfigInput } from './config.js';
export {
  createContentGenerator,
  createLLMProvider,
  ProviderContentGenerator,
  AnthropicProvider,
  OllamaProvider,
  type ContentGenerator,
  type LLMProvider,
} from './llm/index.js';
export { StageRunner, type RunStageOptions, type StageResult, type StageRunnerOptions } from './pipeline/stage-runner.js';
export { PIPELINE_STAGES, STAGE_IDS, getStage, type PipelineStage, type StageId } from './pipeline/stages.js';
export { parseIdeaList, ideaProjectName, ideaBrief, IdeaListSchema, type IdeaListEntry } from './pipeline/idea-list.js';
export { DOC_TYPES, type DocType } from './prompts/stage-prompts.js';
export {
  collectInputs,
  ensureProjectStructure,
  listProjects,
  projectNameFromIdea,
  projectPath,
} from './project.js';
