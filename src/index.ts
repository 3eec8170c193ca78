export { ChatClient, type ChatClientOptions, type Transport } from './client.js';
export { StreamingChatUpdates, DONE_SENTINEL, type ResponseBootstrap } from './chat/streaming.js';
export { readEventsFrom, readServerSentEvents, type ServerSentEvent } from './chat/sse.js';
export {
  MAX_TOOL_CALL_INDEX,
  decodeChatCompletion,
  decodeEmbeddingResponse,
  decodeStreamingUpdates,
  toTokenUsage,
} from './chat/updates.js';
export {
  CANCELLED_ERROR_TYPE,
  GENERIC_ERROR_TYPE,
  InvalidStateError,
  asError,
  classifyError,
  isAbortError,
  isClientError,
  makeClientError,
  type ClientError,
} from './client/error-utils.js';
export { loadConfig, defaultConfigPath, type ChatscopeConfig } from './config.js';
export { createLogger, noopLogger, type LogFn, type Logger } from './log.js';
export * from './telemetry/constants.js';
export { ChatTelemetry, type TelemetryOptions } from './telemetry/factory.js';
export {
  TracedOperationScope,
  disabledScope,
  withOverrides,
  type CallReport,
  type OperationScope,
  type ReportHook,
} from './telemetry/scope.js';
export { StreamingScope } from './telemetry/streaming-scope.js';
export type * from './types.js';
