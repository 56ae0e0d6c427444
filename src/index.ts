export * from './types/index.js';
export { Recorder, type RecorderOptions } from './core/recorder.js';
export { Tape, type TapeOptions } from './core/tape.js';
export {
  getPolicy,
  isTapeMode,
  parseTapeMode,
  TAPE_MODES,
  type TapeModePolicy,
  type MatchScope,
  type WriteStrategy,
  type TieBreak,
} from './core/tape-mode.js';
export {
  RequestMatcher,
  MatchRules,
  DEFAULT_MATCH_RULES,
  composeRules,
  headerRule,
  type MatchRule,
} from './core/matcher.js';
export { createInteraction, cloneResponse } from './core/interaction.js';
export {
  TapeInterceptor,
  type Forward,
  type InterceptResult,
  type InterceptSource,
  type TapeInterceptorOptions,
} from './core/interceptor.js';
export { RequestPipeline } from './core/pipeline.js';
export { createTapeFetch, toFetchResponse, toTapeRequest, type TapeFetchOptions } from './core/fetch.js';
export {
  createForwarder,
  SOURCE_HEADER,
  type FetchFunction,
  type ForwarderOptions,
} from './core/http.js';
export { TapeProxy, type TapeProxyEvents, type TapeProxyOptions } from './core/server.js';
export {
  TapeError,
  NonWritableTapeError,
  SequentialTapeExhaustedError,
  LifecycleConflictError,
  PersistenceError,
  ConfigError,
  type TapeErrorCode,
} from './core/errors.js';
export * from './storage/index.js';
export * from './config/index.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
