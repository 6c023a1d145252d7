/**
 * Response decoding and artifact materialization.
 */

export { normalizeLabel, projectSlug } from './slug.js';
export {
  GRAMMARS,
  getGrammar,
  isGrammarKind,
  type AngleGrammar,
  type BlockRole,
  type FencedGrammar,
  type GrammarDefinition,
  type GrammarKind,
  type LabelStyle,
  type MarkerKind,
  type NestedGrammar,
} from './grammar.js';
export {
  decode,
  decodeResponse,
  unwrapFence,
  type DecodeOptions,
  type DecodeResult,
  type DroppedBlock,
  type ExtractedBlock,
} from './decoder.js';
export {
  DEFAULT_EXTENSIONLESS_FILES,
  validateArtifactPath,
  type PathCheck,
  type PathCheckOptions,
  type PathRejectionKind,
} from './path-safety.js';
export {
  classifyReport,
  materialize,
  resolveArtifactPath,
  summarizeReport,
  type FailedArtifact,
  type FailureKind,
  type MaterializeOptions,
  type StageOutcome,
  type WriteReport,
} from './materializer.js';
