/**
 * @sexpr/core
 *
 * Configuration, logging and error base classes shared by the sexpr packages.
 *
 * @module
 */

export {
  config,
  defineConfig,
  type SexprConfig,
  type SexprConfigKey,
} from "./config.js";

export { createLogger, type Logger, type LogWriter } from "./logger.js";

export { SexprError, ConfigError } from "./errors.js";
