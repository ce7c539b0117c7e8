/**
 * Core module exports for @tinystd/core
 *
 * This package provides:
 * - Configuration (env, config files, programmatic)
 * - Error classes and runtime safety primitives
 * - Scoped logging
 * - Eq / Ord typeclasses
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type TinystdConfig,
  type ChecksConfig,
  type HexConfig,
} from "./config.js";

// Errors
export {
  ContractError,
  PreconditionError,
  InvariantError,
  OutOfRangeError,
  InvalidSizeError,
} from "./errors.js";

// Runtime Safety Primitives
export { precondition, preconditionsEnabled, invariant, unreachable } from "./safety.js";

// Logging
export {
  createLogger,
  formatLogLine,
  setDebugOutput,
  isDebugOutput,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";

// Typeclasses
export {
  makeEq,
  makeOrd,
  toOrdering,
  ordNumber,
  sortWith,
  max,
  min,
  LT,
  EQ_ORD,
  GT,
  type Eq,
  type Ord,
  type Ordering,
} from "./typeclasses.js";
