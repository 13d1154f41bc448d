/**
 * @sysconfig/cli
 *
 * Programmatic surface of the sysconfig-check command.
 */

export { program } from './commands/index.js';
export { EXIT_IO_ERROR, InputReadError, processIO, withFileErrors } from './commands/io.js';
export {
  EXIT_INVALID,
  EXIT_OK,
  checkConfigSource,
  checkShadowSource,
  runCheck,
} from './check.js';
export type { CheckFormat, CheckIO, CheckOutcome, CheckRequest } from './check.js';
export { LOG_FILE_ENV, createLogSink, loadKeywordFile, resolveLogFile, resolveRegistry } from './config.js';
export { FileLogSink, MemoryLogSink, NullLogSink, toCheckEvent } from './logging/log-sink.js';
export type { CheckEvent, LogSink } from './logging/log-sink.js';
export { renderProblems, renderSummary, renderSyntaxError } from './output/report.js';
