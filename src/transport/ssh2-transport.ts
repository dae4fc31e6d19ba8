import net from 'node:net';

import ssh2 from 'ssh2';
import type { Client, ClientChannel, ConnectConfig, ParsedKey } from 'ssh2';

import { EventQueue } from './event-queue.js';
import { HandshakeError, InactivityTimeoutError, TransportError, enrichError } from './errors.js';
import {
  DEFAULT_READY_TIMEOUT_MS,
  formatTarget,
  type AuthOutcome,
  type CertificateMaterial,
  type ChannelEvent,
  type ExecChannel,
  type HandshakeOptions,
  type HostKeyPolicy,
  type PrivateKeyMaterial,
  type TransportConnection,
  type TransportConnector,
  type TransportTarget,
} from './types.js';

/** How long `disconnect` waits for the peer to drop the socket before cutting it. */
const DISCONNECT_WAIT_MS = 2_000;

interface Deferred<T> {
  promise: Promise<T>;
  settled: boolean;
  resolve(value: T): void;
  reject(error: Error): void;
}

function createDeferred<T>(): Deferred<T> {
  let resolvePromise: (value: T) => void = () => undefined;
  let rejectPromise: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((resolve, reject) => {
    resolvePromise = resolve;
    rejectPromise = reject;
  });

  const deferred: Deferred<T> = {
    promise,
    settled: false,
    resolve(value) {
      if (!deferred.settled) {
        deferred.settled = true;
        resolvePromise(value);
      }
    },
    reject(error) {
      if (!deferred.settled) {
        deferred.settled = true;
        rejectPromise(error);
      }
    },
  };
  return deferred;
}

type SignCallback = (error?: Error | null, signature?: Buffer) => void;

function isSignCallback(value: unknown): value is SignCallback {
  return typeof value === 'function';
}

function isSignOptions(value: unknown): value is { hash?: string } {
  return typeof value === 'object' && value !== null;
}

/**
 * Presents an OpenSSH certificate as the identity while signing with the matching private
 * key. ssh2 only sends certificates through its agent path, so the pairing lives here.
 */
class CertificateAgent extends ssh2.BaseAgent {
  constructor(
    private readonly privateKey: ParsedKey,
    private readonly certificate: ParsedKey,
  ) {
    super();
  }

  getIdentities(callback: (error: Error | undefined, identities: ParsedKey[]) => void): void {
    callback(undefined, [this.certificate]);
  }

  sign(_identity: unknown, data: Buffer, ...rest: unknown[]): void {
    const callback = rest.find(isSignCallback);
    if (!callback) {
      return;
    }
    const options = rest.find(isSignOptions);
    const signature = this.privateKey.sign(data, options?.hash);
    if (signature instanceof Error) {
      callback(signature);
      return;
    }
    callback(null, signature);
  }
}

type AuthRequest =
  | { type: 'publickey'; username: string; key: ParsedKey }
  | { type: 'agent'; username: string; agent: CertificateAgent };

type ConnectionPhase = 'handshake' | 'awaiting-auth' | 'authenticating' | 'ready' | 'closed';

function openSocket(target: TransportTarget, timeoutMs: number): Promise<net.Socket> {
  const label = formatTarget(target);

  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: target.host, port: target.port });

    const cleanup = (): void => {
      socket.off('connect', onConnect);
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
    };
    const onConnect = (): void => {
      cleanup();
      socket.setTimeout(0);
      resolve(socket);
    };
    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(new HandshakeError(`Cannot reach ${label}: ${error.message}`, { cause: error }));
    };
    const onTimeout = (): void => {
      cleanup();
      socket.destroy();
      reject(new HandshakeError(`Timed out connecting to ${label} after ${timeoutMs}ms`));
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', onConnect);
    socket.once('error', onError);
    socket.once('timeout', onTimeout);
  });
}

class Ssh2ExecChannel implements ExecChannel {
  private readonly queue = new EventQueue<ChannelEvent>();
  private stream: ClientChannel | null = null;
  private pendingExec: ((error: Error) => void) | null = null;
  private closed = false;

  constructor(
    private readonly client: Client,
    private readonly label: string,
    private readonly release: (channel: Ssh2ExecChannel) => void,
  ) {}

  exec(command: string): Promise<void> {
    if (this.stream || this.pendingExec) {
      return Promise.reject(new TransportError(`Channel on ${this.label} already carries a command`));
    }
    if (this.closed) {
      return Promise.reject(new TransportError(`Channel on ${this.label} is closed`));
    }

    return new Promise((resolve, reject) => {
      this.pendingExec = reject;
      this.client.exec(command, (error, stream) => {
        this.pendingExec = null;
        if (error) {
          reject(enrichError(error, TransportError, this.label));
          return;
        }
        this.attach(stream);
        resolve();
      });
    });
  }

  events(): AsyncIterable<ChannelEvent> {
    return this.queue;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stream?.close();
    this.queue.close();
    this.release(this);
  }

  /** Ends the event sequence with an error; used when the connection underneath fails. */
  fail(error: Error): void {
    this.pendingExec?.(error);
    this.pendingExec = null;
    this.queue.fail(error);
  }

  /** Ends the event sequence cleanly; used when the connection closes without a failure. */
  end(): void {
    this.queue.close();
  }

  private attach(stream: ClientChannel): void {
    this.stream = stream;

    stream.on('data', (chunk: Buffer) => {
      this.queue.push({ kind: 'data', data: chunk });
    });
    stream.stderr.on('data', (chunk: Buffer) => {
      this.queue.push({ kind: 'extended-data', stream: 1, data: chunk });
    });
    stream.on('exit', (code: number | null, signal?: string, _coreDumped?: boolean, description?: string) => {
      if (typeof code === 'number') {
        this.queue.push({ kind: 'exit-status', code });
        return;
      }
      this.queue.push({ kind: 'exit-signal', signal: signal ?? 'unknown', message: description || undefined });
    });
    stream.on('eof', () => {
      this.queue.push({ kind: 'eof' });
    });
    stream.on('error', (error: Error) => {
      this.queue.fail(enrichError(error, TransportError, this.label));
    });
    stream.on('close', () => {
      this.closed = true;
      this.queue.close();
      this.release(this);
    });
  }
}

/**
 * ssh2 runs handshake and authentication as one flow. The auth handler is first invoked once
 * the transport is up, so the pending `next` is parked there until the caller picks a method.
 */
class Ssh2Connection implements TransportConnection {
  private phase: ConnectionPhase = 'handshake';
  private readonly handshake = createDeferred<void>();
  private readonly closed = createDeferred<void>();
  private nextAuth: ((request: AuthRequest) => void) | null = null;
  private authAttempt: Deferred<AuthOutcome> | null = null;
  private readonly channels = new Set<Ssh2ExecChannel>();
  private failure: Error | null = null;
  private readonly label: string;

  constructor(
    private readonly client: Client,
    private readonly socket: net.Socket,
    target: TransportTarget,
  ) {
    this.label = formatTarget(target);
  }

  start(target: TransportTarget, options: HandshakeOptions): Promise<void> {
    this.client
      .on('ready', () => this.onReady())
      .on('error', (error: Error & { level?: string }) => this.onError(error))
      .on('close', () => this.onClose());

    this.socket.setTimeout(options.inactivityTimeoutMs);
    this.socket.on('timeout', () => {
      const timeout = new InactivityTimeoutError(options.inactivityTimeoutMs);
      if (this.phase === 'ready') {
        this.fail(timeout);
        return;
      }
      // Silence before authentication completes is a failed handshake, not an idle session.
      this.fail(
        new HandshakeError(
          `No traffic from ${this.label} for ${options.inactivityTimeoutMs}ms before authentication completed`,
          { cause: timeout },
        ),
      );
    });

    const config: ConnectConfig = {
      sock: this.socket,
      host: target.host,
      port: target.port,
      username: options.username,
      readyTimeout: options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
      keepaliveInterval: options.keepAliveIntervalMs,
      algorithms: { kex: [...options.keyExchange] },
      hostVerifier: (key: Buffer, verify: (valid: boolean) => void) => {
        this.verifyHost(options.hostKeyPolicy, target, key, verify);
      },
      authHandler: (methodsLeft, _partialSuccess, next) => {
        this.onAuthRequest(methodsLeft, next);
      },
    };

    this.client.connect(config);
    return this.handshake.promise;
  }

  authenticatePublicKey(username: string, key: PrivateKeyMaterial): Promise<AuthOutcome> {
    return this.beginAuth({ type: 'publickey', username, key: key.key });
  }

  authenticateCertificate(
    username: string,
    key: PrivateKeyMaterial,
    certificate: CertificateMaterial,
  ): Promise<AuthOutcome> {
    return this.beginAuth({
      type: 'agent',
      username,
      agent: new CertificateAgent(key.key, certificate.certificate),
    });
  }

  async openChannel(): Promise<ExecChannel> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.phase !== 'ready') {
      throw new TransportError(`Connection to ${this.label} is not authenticated`);
    }
    const channel = new Ssh2ExecChannel(this.client, this.label, (released) => {
      this.channels.delete(released);
    });
    this.channels.add(channel);
    return channel;
  }

  async disconnect(): Promise<void> {
    if (this.phase === 'closed') {
      return;
    }
    this.client.end();
    await this.waitForClose(DISCONNECT_WAIT_MS);
  }

  destroy(): void {
    this.socket.destroy();
  }

  private beginAuth(request: AuthRequest): Promise<AuthOutcome> {
    const next = this.nextAuth;
    if (this.phase !== 'awaiting-auth' || !next) {
      return Promise.reject(
        this.failure ?? new TransportError(`Connection to ${this.label} cannot authenticate now`),
      );
    }

    this.nextAuth = null;
    this.phase = 'authenticating';
    const attempt = createDeferred<AuthOutcome>();
    this.authAttempt = attempt;
    next(request);
    return attempt.promise;
  }

  private onAuthRequest(
    methodsLeft: readonly string[] | null,
    next: (request: AuthRequest) => void,
  ): void {
    switch (this.phase) {
      case 'handshake':
        this.phase = 'awaiting-auth';
        this.nextAuth = next;
        this.handshake.resolve();
        return;
      case 'authenticating': {
        // asked again: the method we offered was rejected
        const attempt = this.authAttempt;
        this.authAttempt = null;
        attempt?.resolve({ success: false, remainingMethods: methodsLeft ? [...methodsLeft] : [] });
        this.client.end();
        return;
      }
      default:
        this.client.end();
    }
  }

  private verifyHost(
    policy: HostKeyPolicy,
    target: TransportTarget,
    key: Buffer,
    verify: (valid: boolean) => void,
  ): void {
    const identity = { host: target.host, port: target.port, key };
    void Promise.resolve()
      .then(() => policy.verify(identity))
      .then(
        (trusted) => {
          if (!trusted) {
            this.failure = new HandshakeError(
              `Host key for ${this.label} rejected by ${policy.name} policy`,
            );
          }
          verify(trusted);
        },
        (err: unknown) => {
          this.failure = enrichError(err, HandshakeError, this.label);
          verify(false);
        },
      );
  }

  private onReady(): void {
    if (this.phase !== 'authenticating') {
      return;
    }
    this.phase = 'ready';
    const attempt = this.authAttempt;
    this.authAttempt = null;
    attempt?.resolve({ success: true });
  }

  private onError(error: Error & { level?: string }): void {
    if (error.level === 'client-authentication' && this.authAttempt) {
      const attempt = this.authAttempt;
      this.authAttempt = null;
      attempt.resolve({ success: false, remainingMethods: [] });
      return;
    }

    const ErrorClass = this.phase === 'ready' ? TransportError : HandshakeError;
    this.fail(this.failure ?? enrichError(error, ErrorClass, this.label));
  }

  private onClose(): void {
    const wasReady = this.phase === 'ready';
    this.phase = 'closed';
    this.closed.resolve();

    const error =
      this.failure ??
      (wasReady
        ? new TransportError(`Connection to ${this.label} closed`)
        : new HandshakeError(`Connection to ${this.label} closed during handshake`));

    this.handshake.reject(error);
    if (this.authAttempt) {
      this.authAttempt.reject(error);
      this.authAttempt = null;
    }
    for (const channel of this.channels) {
      if (this.failure) {
        channel.fail(this.failure);
      } else {
        channel.end();
      }
    }
    this.channels.clear();
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.handshake.reject(error);
    if (this.authAttempt) {
      this.authAttempt.reject(error);
      this.authAttempt = null;
    }
    for (const channel of this.channels) {
      channel.fail(error);
    }
    this.socket.destroy();
  }

  private waitForClose(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.socket.destroy();
        resolve();
      }, timeoutMs);
      void this.closed.promise.then(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}

/** Production transport backed by the ssh2 client. */
export class Ssh2Transport implements TransportConnector {
  async connect(target: TransportTarget, options: HandshakeOptions): Promise<TransportConnection> {
    const socket = await openSocket(target, options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS);
    const connection = new Ssh2Connection(new ssh2.Client(), socket, target);

    try {
      await connection.start(target, options);
    } catch (err) {
      connection.destroy();
      throw enrichError(err, HandshakeError, formatTarget(target));
    }
    return connection;
  }
}
