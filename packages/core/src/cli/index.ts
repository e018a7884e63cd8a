/**
 * Command-line front end.
 * @packageDocumentation
 */

export { run, type CliOutput } from './run'
export { resolveConfig, ConfigError, LEVEL_ENV, CONSTRAINTS_DIR_ENV, type CliConfig, type CliFlags } from './config'
