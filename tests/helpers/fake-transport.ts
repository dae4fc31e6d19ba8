import { generateKeyPairSync } from 'node:crypto';

import ssh2 from 'ssh2';
import type { ParsedKey } from 'ssh2';

import { SessionLogger } from '../../src/logging/index.js';
import type { OutputSink } from '../../src/session/output-sink.js';
import type { ConnectOptions } from '../../src/session/types.js';
import { EventQueue } from '../../src/transport/event-queue.js';
import { AcceptAnyHostKeyPolicy } from '../../src/transport/host-key-policy.js';
import type {
  AuthOutcome,
  CertificateMaterial,
  ChannelEvent,
  Credentials,
  ExecChannel,
  HandshakeOptions,
  PrivateKeyMaterial,
  TransportConnection,
  TransportConnector,
  TransportTarget,
} from '../../src/transport/types.js';

export interface FakeScript {
  /** Pushed in order once `exec` is called; the channel then closes. */
  events?: ChannelEvent[];
  /** Ends the event sequence with this error instead of closing it. */
  failWith?: Error;
  /** `exec` waits for this before emitting anything. */
  gate?: Promise<void>;
  handshakeError?: Error;
  authOutcome?: AuthOutcome;
  openError?: Error;
  disconnectError?: Error;
}

export function generateRsaKeyPair(): { privateKey: string; publicKey: string } {
  return generateKeyPairSync('rsa', {
    modulusLength: 2048,
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
}

export function parseTestKey(data: string | Buffer): ParsedKey {
  const parsed = ssh2.utils.parseKey(data);
  if (parsed instanceof Error) {
    throw parsed;
  }
  return parsed;
}

let sharedKey: ParsedKey | undefined;

export function createCredentials(withCertificate = false): Credentials {
  sharedKey ??= parseTestKey(generateRsaKeyPair().privateKey);
  const key = sharedKey;
  const privateKey: PrivateKeyMaterial = { source: '/keys/id_rsa', algorithm: key.type, key };
  if (!withCertificate) {
    return { privateKey };
  }
  const certificate: CertificateMaterial = {
    source: '/keys/id_rsa-cert.pub',
    certificateType: 'ssh-rsa-cert-v01@openssh.com',
    certificate: key,
  };
  return { privateKey, certificate };
}

export function createConnectOptions(credentials: Credentials): ConnectOptions {
  return {
    credentials,
    username: 'deploy',
    target: { host: 'example.test', port: 22 },
    inactivityTimeoutMs: 5_000,
    keyExchange: ['curve25519-sha256'],
    hostKeyPolicy: new AcceptAnyHostKeyPolicy(),
  };
}

export function silentLogger(): SessionLogger {
  return new SessionLogger({ level: 'silent' });
}

export class MemorySink implements OutputSink {
  readonly chunks: Uint8Array[] = [];

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(chunk);
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

export class FailingSink implements OutputSink {
  async write(): Promise<void> {
    throw new Error('EPIPE: broken pipe');
  }
}

export function data(text: string): ChannelEvent {
  return { kind: 'data', data: Buffer.from(text) };
}

export function exitStatus(code: number): ChannelEvent {
  return { kind: 'exit-status', code };
}

export class FakeChannel implements ExecChannel {
  readonly queue = new EventQueue<ChannelEvent>();
  command: string | undefined;
  closeCount = 0;

  constructor(private readonly script: FakeScript) {}

  async exec(command: string): Promise<void> {
    this.command = command;
    void this.emit();
  }

  events(): AsyncIterable<ChannelEvent> {
    return this.queue;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    this.queue.close();
  }

  private async emit(): Promise<void> {
    await this.script.gate;
    for (const event of this.script.events ?? []) {
      this.queue.push(event);
    }
    if (this.script.failWith) {
      this.queue.fail(this.script.failWith);
    } else {
      this.queue.close();
    }
  }
}

export class FakeConnection implements TransportConnection {
  readonly authCalls: Array<{ method: 'publickey' | 'certificate'; username: string }> = [];
  readonly channels: FakeChannel[] = [];
  disconnectCount = 0;
  destroyCount = 0;

  constructor(private readonly script: FakeScript) {}

  async authenticatePublicKey(username: string): Promise<AuthOutcome> {
    this.authCalls.push({ method: 'publickey', username });
    return this.script.authOutcome ?? { success: true };
  }

  async authenticateCertificate(username: string): Promise<AuthOutcome> {
    this.authCalls.push({ method: 'certificate', username });
    return this.script.authOutcome ?? { success: true };
  }

  async openChannel(): Promise<ExecChannel> {
    if (this.script.openError) {
      throw this.script.openError;
    }
    const channel = new FakeChannel(this.script);
    this.channels.push(channel);
    return channel;
  }

  async disconnect(): Promise<void> {
    this.disconnectCount += 1;
    if (this.script.disconnectError) {
      throw this.script.disconnectError;
    }
  }

  destroy(): void {
    this.destroyCount += 1;
  }
}

export class FakeTransport implements TransportConnector {
  readonly connections: FakeConnection[] = [];
  readonly handshakes: Array<{ target: TransportTarget; options: HandshakeOptions }> = [];

  constructor(private readonly script: FakeScript = {}) {}

  async connect(target: TransportTarget, options: HandshakeOptions): Promise<TransportConnection> {
    this.handshakes.push({ target, options });
    if (this.script.handshakeError) {
      throw this.script.handshakeError;
    }
    const connection = new FakeConnection(this.script);
    this.connections.push(connection);
    return connection;
  }
}
