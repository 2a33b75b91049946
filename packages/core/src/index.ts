/**
 * Core module exports for @tagweave/core
 *
 * This package provides the ambient pieces shared by every tagweave package:
 * - Configuration (env, config files, programmatic)
 * - Scoped logging
 * - Runtime safety primitives (invariant, unreachable)
 * - Source diagnostics rendering
 */

// Configuration System
export {
  config,
  defineConfig,
  ConfigError,
  type TagweaveConfig,
  type DiagnosticsConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger.js";

// Runtime Safety Primitives
export { invariant, unreachable, InvariantError } from "./safety.js";

// Diagnostics
export {
  locate,
  renderDiagnostic,
  printDiagnostic,
  type Severity,
  type SourceLocation,
  type SourceDiagnostic,
  type RenderOptions,
  type PrintOptions,
} from "./diagnostics.js";
