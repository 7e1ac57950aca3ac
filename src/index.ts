export type {
  SourceLine,
  Service,
  ExtendsReference,
  ServiceDeclaration,
  ComposeDocument,
  ComposeProject,
  StageCommand,
  FileCopy,
  Label,
  BuildStage,
  Recipe,
  CliOptions,
  ResolvedConfig,
  CommandRequest,
} from './types/index.js';

export {
  TranslationError,
  GrammarError,
  MissingReferenceError,
  MissingFieldError,
  ExtendsCycleError,
} from './errors.js';
export type { TranslationErrorKind, SourceLocation } from './errors.js';

export { LineReader } from './parsers/lines.js';
export { parseComposeDocument, readComposeDocument, tokenizeCompose } from './parsers/compose.js';
export { ComposeResolver, mergeExtends, parseCompose, MAX_EXTENDS_DEPTH } from './parsers/extends.js';
export { parseDockerfile, readDockerfile } from './parsers/dockerfile.js';
export { renderDefinition, writeDefinitionFile } from './writers/definition.js';
export { synthesizeCommand, formatCommand, DEFAULT_BINARY } from './apptainer/command.js';
export { runApptainer } from './apptainer/exec.js';
export { resolveConfig } from './config.js';
export { createLogger, silentLogger } from './ui/logger.js';
export type { Logger } from './ui/logger.js';
