import { nanoid } from 'nanoid/non-secure';

import type { CallLogContext, SessionLogContext, SessionLogger } from '../logging/index.js';
import {
  AuthenticationError,
  HandshakeError,
  OutputError,
  ProtocolConsistencyError,
  SessionStateError,
  enrichError,
  isConnectionFailure,
  type AuthMethod,
} from '../transport/errors.js';
import {
  formatTarget,
  type AuthOutcome,
  type ExecChannel,
  type TransportConnection,
} from '../transport/types.js';
import type { OutputSink } from './output-sink.js';
import type { CallMetadata, ConnectOptions, ExecutionResult, SessionDependencies } from './types.js';

export const DISCONNECT_DESCRIPTION = 'session closed by client';

type SessionState =
  | { status: 'idle'; connection: TransportConnection }
  | { status: 'channel-open'; connection: TransportConnection; channel?: ExecChannel }
  | { status: 'closed' };

export function createCallMetadata(): CallMetadata {
  return {
    invocationId: nanoid(12),
    startedAt: new Date(),
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function authenticate(
  connection: TransportConnection,
  options: ConnectOptions,
  target: string,
): Promise<void> {
  const { credentials, username } = options;
  const method: AuthMethod = credentials.certificate ? 'certificate' : 'publickey';

  let outcome: AuthOutcome;
  try {
    outcome = credentials.certificate
      ? await connection.authenticateCertificate(username, credentials.privateKey, credentials.certificate)
      : await connection.authenticatePublicKey(username, credentials.privateKey);
  } catch (err) {
    throw enrichError(err, HandshakeError, target);
  }

  if (!outcome.success) {
    const label = method === 'certificate' ? 'publickey+certificate' : 'publickey';
    const remaining = outcome.remainingMethods.length > 0 ? outcome.remainingMethods.join(',') : 'none';
    throw new AuthenticationError(
      method,
      username,
      `Authentication (with ${label}) failed for ${username}@${target}; server still accepts: ${remaining}`,
    );
  }
}

/**
 * One authenticated connection that runs commands one at a time.
 *
 * `call` opens a fresh channel per command and drains it until the peer closes it; the
 * exit status is only trusted once the event stream is exhausted, since data may trail it.
 */
export class Session {
  private state: SessionState;
  private readonly context: SessionLogContext;
  private readonly logger: SessionLogger;
  private readonly output: OutputSink;
  private readonly errorOutput: OutputSink | undefined;

  private constructor(
    connection: TransportConnection,
    context: SessionLogContext,
    dependencies: SessionDependencies,
  ) {
    this.state = { status: 'idle', connection };
    this.context = context;
    this.logger = dependencies.logger;
    this.output = dependencies.output;
    this.errorOutput = dependencies.errorOutput;
  }

  static async connect(options: ConnectOptions, dependencies: SessionDependencies): Promise<Session> {
    const { logger, transport } = dependencies;
    const target = formatTarget(options.target);
    const context: SessionLogContext = {
      sessionId: nanoid(12),
      target,
      username: options.username,
    };

    logger.logConnectStart({
      ...context,
      authMethod: options.credentials.certificate ? 'certificate' : 'publickey',
      keySource: options.credentials.privateKey.source,
      certificateSource: options.credentials.certificate?.source,
      keyExchange: options.keyExchange,
      hostKeyPolicy: options.hostKeyPolicy.name,
      inactivityTimeoutMs: options.inactivityTimeoutMs,
    });

    const startedAt = Date.now();

    let connection: TransportConnection;
    try {
      connection = await transport.connect(options.target, {
        username: options.username,
        keyExchange: options.keyExchange,
        hostKeyPolicy: options.hostKeyPolicy,
        inactivityTimeoutMs: options.inactivityTimeoutMs,
        readyTimeoutMs: options.readyTimeoutMs,
        keepAliveIntervalMs: options.keepAliveIntervalMs,
      });
    } catch (err) {
      const error = enrichError(err, HandshakeError, target);
      logger.logConnectError(context, error);
      throw error;
    }

    try {
      await authenticate(connection, options, target);
    } catch (err) {
      const error = toError(err);
      logger.logConnectError(context, error);
      connection.destroy();
      throw error;
    }

    logger.logConnected(context, Date.now() - startedAt);
    return new Session(connection, context, dependencies);
  }

  get status(): SessionState['status'] {
    return this.state.status;
  }

  /** Runs one command and resolves to its exit status once the channel has closed. */
  async call(command: string): Promise<number> {
    const connection = this.claim();
    const metadata = createCallMetadata();
    const context: CallLogContext = { ...this.context, invocationId: metadata.invocationId, command };

    this.logger.logCallStart(context);

    let channel: ExecChannel | undefined;
    try {
      channel = await connection.openChannel();
      if (this.state.status === 'channel-open') {
        this.state.channel = channel;
      }
      await channel.exec(command);

      const result = await this.drain(channel, context, metadata);
      this.logger.logCallResult(context, result);
      return result.exitCode;
    } catch (err) {
      const error = toError(err);
      this.logger.logCallError(context, error, metadata.startedAt);
      if (isConnectionFailure(error)) {
        await this.close();
      }
      throw error;
    } finally {
      const opened = channel;
      if (opened) {
        await this.attempt('channel-close', () => opened.close());
      }
      if (this.state.status === 'channel-open') {
        this.state = { status: 'idle', connection };
      }
    }
  }

  /**
   * Sends a disconnect notice and releases the connection. Never throws: a broken transport
   * can fail the notice, but the handle is released on every path.
   */
  async close(description: string = DISCONNECT_DESCRIPTION): Promise<void> {
    const state = this.state;
    if (state.status === 'closed') {
      return;
    }
    this.state = { status: 'closed' };

    const { connection } = state;
    try {
      if (state.status === 'channel-open' && state.channel) {
        const { channel } = state;
        await this.attempt('channel-close', () => channel.close());
      }
      this.logger.logDisconnect(this.context, description);
      await this.attempt('disconnect', () => connection.disconnect());
    } finally {
      connection.destroy();
    }
  }

  private claim(): TransportConnection {
    switch (this.state.status) {
      case 'idle': {
        const { connection } = this.state;
        this.state = { status: 'channel-open', connection };
        return connection;
      }
      case 'channel-open':
        throw new SessionStateError('A command is already running on this session');
      case 'closed':
        throw new SessionStateError('Session is closed');
    }
  }

  private async drain(
    channel: ExecChannel,
    context: CallLogContext,
    metadata: CallMetadata,
  ): Promise<ExecutionResult> {
    let exitCode: number | undefined;
    let bytesWritten = 0;

    for await (const event of channel.events()) {
      this.logger.logChannelEvent(context, event);

      switch (event.kind) {
        case 'data':
          await this.write(this.output, event.data, 'stdout');
          bytesWritten += event.data.byteLength;
          break;
        case 'extended-data':
          if (this.errorOutput) {
            await this.write(this.errorOutput, event.data, 'stderr');
          }
          break;
        case 'exit-status':
          // trailing data may still follow; keep draining
          exitCode = event.code;
          break;
        case 'exit-signal':
        case 'eof':
          break;
        default: {
          const unknownEvent: never = event;
          void unknownEvent;
        }
      }
    }

    if (exitCode === undefined) {
      throw new ProtocolConsistencyError(
        `Channel on ${this.context.target} closed without reporting an exit status`,
      );
    }

    return {
      exitCode,
      bytesWritten,
      durationMs: Date.now() - metadata.startedAt.getTime(),
    };
  }

  private async write(sink: OutputSink, chunk: Uint8Array, label: string): Promise<void> {
    try {
      await sink.write(chunk);
    } catch (err) {
      throw new OutputError(`Failed to write remote output to local ${label}`, { cause: toError(err) });
    }
  }

  private async attempt(step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      this.logger.logDisconnectFailure(this.context, step, toError(err));
    }
  }
}

/** Connects, runs `fn`, and closes the session on every exit path. */
export async function withSession<T>(
  options: ConnectOptions,
  dependencies: SessionDependencies,
  fn: (session: Session) => Promise<T>,
): Promise<T> {
  const session = await Session.connect(options, dependencies);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
