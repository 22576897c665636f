// Shared infrastructure
//
// Cross-cutting utilities used by every package.
// IMPORTANT: This package has no workspace dependencies.

export {
  debug,
  getDebugChannel,
  refreshDebugChannels,
  configureDebug,
  isDebugEnabled,
  DEBUG_ENV,
  DEBUG_CHANNELS,
  type DebugChannel,
  type DebugChannelName,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export { createConsoleLogger, NOOP_LOGGER, type Logger } from "./logger.js";

export { isKeyed, shortHash, stableHash, stableSerialize, type Keyed } from "./hash.js";

export {
  buildDiagnostic,
  diagnosticKey,
  formatDiagnostic,
  hasErrors,
  type BuildDiagnosticInput,
  type Diagnostic,
  type DiagnosticSeverity,
  type DiagnosticStage,
} from "./diagnostics.js";
