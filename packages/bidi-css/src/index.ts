export { VERSION } from "./version.js";

// Directions
export {
  Direction,
  DIRECTIONS,
  TOKEN_NAMES,
  isDirection,
  resolveProfile,
  oppositeOf,
  bindingFor,
  canonicalTokenName,
  resolveFloat,
  resolveTextAlign,
} from "./direction.js";
export type { DirectionProfile, Side, TokenName } from "./direction.js";

// Parser
export { tokenize, tokenizeSource, listTokenReferences } from "./parser/lexer.js";
export { SegmentType } from "./parser/types.js";
export type {
  StylesheetSource,
  Segment,
  TextSegment,
  TokenReference,
  TokenContext,
  TokenSyntax,
  SourcePosition,
} from "./parser/types.js";

// Sources
export { createSource, sourceText, readSource } from "./source.js";

// Generator
export { generate, generateAll, generateEach } from "./generator.js";
export type {
  GeneratedStylesheet,
  Substitution,
  DirectionOutcome,
} from "./generator.js";

// Validator
export { checkSource, checkSourceOrRaise, Severity } from "./validator.js";
export type { Diagnostic, LintRule, LintInput } from "./validator.js";

// Errors
export {
  BidiCssError,
  InvalidDirectionError,
  UnknownTokenError,
  SourceSyntaxError,
  SourceValidationError,
  SourceReadError,
  OutputWriteError,
  ConfigError,
  CliUsageError,
} from "./errors.js";

// Events
export { BuildEventEmitter } from "./events.js";
export type {
  BuildEvent,
  EventListener,
  BuildStartedEvent,
  SourceLoadedEvent,
  DiagnosticReportedEvent,
  StylesheetGeneratedEvent,
  StylesheetWrittenEvent,
  DirectionFailedEvent,
  TargetFailedEvent,
  BuildCompletedEvent,
} from "./events.js";

// Builder (top-level API)
export { StylesheetBuilder, WRITE_MODES } from "./builder.js";
export type {
  BuilderConfig,
  BuildTarget,
  BuildReport,
  TargetReport,
  DirectionReport,
  DirectionStatus,
  WriteMode,
} from "./builder.js";

// Config
export {
  CONFIG_FILE_NAME,
  WRITE_MODE_ENV,
  loadConfig,
  parseConfig,
  inferDirection,
  targetsFromFileMap,
} from "./config.js";
export type { BidiConfig } from "./config.js";

// CLI
export { runCli, parseCliArgs, formatEvent, usageText } from "./cli.js";
export type { CliIO, ParsedArgs } from "./cli.js";
