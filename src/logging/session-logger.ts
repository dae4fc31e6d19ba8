import { pino } from 'pino';

import type { AuthMethod } from '../transport/errors.js';
import type { ChannelEvent, HostIdentity } from '../transport/types.js';
import type { ExecutionResult } from '../session/types.js';

export const LOG_PATH_ENV_VAR = 'REMOTE_EXEC_LOG_PATH';

/** Standard error; stdout belongs to the remote command's output. */
const STDERR_FD = 2;

export interface SessionLoggerOptions {
  /** Log file; defaults to REMOTE_EXEC_LOG_PATH if set, else stderr. */
  destination?: string;
  level?: pino.LevelWithSilent;
}

export interface SessionLogContext {
  sessionId: string;
  target: string;
  username: string;
}

export interface ConnectStartEvent extends SessionLogContext {
  authMethod: AuthMethod;
  keySource: string;
  certificateSource?: string;
  keyExchange: readonly string[];
  hostKeyPolicy: string;
  inactivityTimeoutMs: number;
}

export interface CallLogContext extends SessionLogContext {
  invocationId: string;
  command: string;
}

export interface CallResultEvent extends CallLogContext {
  finishedAt: string;
  result: ExecutionResult;
}

export interface CallErrorEvent extends CallLogContext {
  finishedAt: string;
  durationMs: number;
  errorName: string;
  errorMessage: string;
  stack?: string;
}

function describeEvent(event: ChannelEvent): Record<string, unknown> {
  switch (event.kind) {
    case 'data':
      return { kind: event.kind, bytes: event.data.byteLength };
    case 'extended-data':
      return { kind: event.kind, stream: event.stream, bytes: event.data.byteLength };
    case 'exit-status':
      return { kind: event.kind, code: event.code };
    case 'exit-signal':
      return { kind: event.kind, signal: event.signal, message: event.message };
    case 'eof':
      return { kind: event.kind };
  }
}

export class SessionLogger {
  private readonly logger: pino.Logger;

  constructor(options: SessionLoggerOptions = {}) {
    const destination = options.destination ?? process.env[LOG_PATH_ENV_VAR];

    this.logger = pino(
      {
        name: 'remote-exec',
        level: options.level ?? 'info',
      },
      pino.destination(destination ?? STDERR_FD),
    );
  }

  logConnectStart(event: ConnectStartEvent): void {
    this.logger.info({ event: 'session:connect', ...event }, 'Connecting');
  }

  logConnected(context: SessionLogContext, durationMs: number): void {
    this.logger.info({ event: 'session:connected', ...context, durationMs }, 'Connected');
  }

  logConnectError(context: SessionLogContext, error: Error): void {
    this.logger.error(
      { event: 'session:connect-error', ...context, errorName: error.name, errorMessage: error.message },
      'Connection failed',
    );
  }

  logUnverifiedHostKey(identity: HostIdentity): void {
    this.logger.warn(
      {
        event: 'session:host-key-unverified',
        target: `${identity.host}:${identity.port}`,
        hostKey: identity.key.toString('base64'),
      },
      'Accepting server host key without verification',
    );
  }

  logCallStart(context: CallLogContext): void {
    this.logger.info(
      { event: 'call:start', ...context, startedAt: new Date().toISOString() },
      'Remote command started',
    );
  }

  logChannelEvent(context: CallLogContext, event: ChannelEvent): void {
    this.logger.debug({ event: 'call:event', ...context, channelEvent: describeEvent(event) }, 'Channel event');
  }

  logCallResult(context: CallLogContext, result: ExecutionResult): void {
    const payload: CallResultEvent = {
      ...context,
      finishedAt: new Date().toISOString(),
      result,
    };

    this.logger.info({ event: 'call:result', ...payload }, 'Remote command finished');
  }

  logCallError(context: CallLogContext, error: Error, startedAt: Date): void {
    const finishedAt = new Date();
    const payload: CallErrorEvent = {
      ...context,
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack,
    };

    this.logger.error({ event: 'call:error', ...payload }, 'Remote command failed');
  }

  logDisconnect(context: SessionLogContext, description: string): void {
    this.logger.info({ event: 'session:disconnect', ...context, description }, 'Disconnecting');
  }

  logDisconnectFailure(context: SessionLogContext, step: string, error: Error): void {
    this.logger.warn(
      { event: 'session:disconnect-error', ...context, step, errorMessage: error.message },
      'Ignoring failure during disconnect',
    );
  }
}
