/**
 * @rcon-console/client — RCON session client and console
 */

export {
  Connection,
  dialTcp,
  MAX_COMMAND_LENGTH,
  type ConnectionState,
  type ConnectionEvents,
  type ConnectionOptions,
  type Dialer,
} from "./connection.js";
export { SocketReader } from "./socket-reader.js";
export {
  formatResponse,
  stripColorCodes,
  translateColorCodes,
  type ColorMode,
  type DisplayOptions,
} from "./format.js";
export {
  runBatch,
  runLineConsole,
  type BatchOptions,
  type CommandExecutor,
  type RunnerOptions,
  type TextSink,
} from "./runner.js";
export {
  parseCliArgs,
  UsageError,
  DEFAULT_HOST,
  DEFAULT_PORT,
  type ClientConfig,
  type CliRequest,
} from "./config.js";
export { default as App, runConsoleApp } from "./app.js";
export { consoleReducer, initialState, type ConsoleState, type ConsoleAction, type TranscriptEntry } from "./state.js";
