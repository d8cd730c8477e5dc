/**
 * @fileoverview binforge build engine
 *
 * Fetches, configures and compiles Bitcoin Core and Electrs from source with
 * host-tuned compiler flags. The engine is driven through a validated
 * {@link BuildRequest} and reports through the {@link BuildOrchestrator}
 * event stream.
 *
 * @license BSD-3-Clause
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './platforms';
export * from './version';
export * from './version-catalog';
export * from './environment';
export * from './fetch-source';
export * from './verify-source';
export * from './compile';
export * from './collect-artifacts';
export * from './orchestrator';
export * from './doctor';
export { GitClient } from './utils/git';
export {
  Logger,
  configureLogger,
  createLogger,
  logger,
  parseLogLevel,
  type LoggerConfig
} from './utils/logger';
export {
  OutputTail,
  SpawnCommandRunner,
  captureCommand,
  formatCommandLine,
  type CommandOutcome,
  type CommandRunner,
  type CommandSpec,
  type LineListener
} from './utils/process';
