export {
  LOG_PATH_ENV_VAR,
  SessionLogger,
  type CallErrorEvent,
  type CallLogContext,
  type CallResultEvent,
  type ConnectStartEvent,
  type SessionLogContext,
  type SessionLoggerOptions,
} from './session-logger.js';
