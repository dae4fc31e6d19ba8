import type { ParsedKey } from 'ssh2';

/** Key exchange algorithms an operator may allow. SHA-1 groups are not accepted. */
export const KEX_ALGORITHMS = [
  'curve25519-sha256',
  'curve25519-sha256@libssh.org',
  'ecdh-sha2-nistp256',
  'ecdh-sha2-nistp384',
  'ecdh-sha2-nistp521',
  'diffie-hellman-group-exchange-sha256',
  'diffie-hellman-group14-sha256',
  'diffie-hellman-group16-sha512',
  'diffie-hellman-group18-sha512',
] as const;

export type KexAlgorithmName = (typeof KEX_ALGORITHMS)[number];

export const DEFAULT_KEX_ALGORITHMS: readonly KexAlgorithmName[] = [
  'curve25519-sha256',
  'curve25519-sha256@libssh.org',
];

export const DEFAULT_READY_TIMEOUT_MS = 20_000;

export interface TransportTarget {
  host: string;
  port: number;
}

export interface PrivateKeyMaterial {
  /** Where the key was loaded from; used in log lines and errors only. */
  source: string;
  /** Key type as reported by the parser, e.g. `ssh-ed25519`. */
  algorithm: string;
  key: ParsedKey;
}

export interface CertificateMaterial {
  source: string;
  /** Certificate type, e.g. `ssh-ed25519-cert-v01@openssh.com`. */
  certificateType: string;
  certificate: ParsedKey;
}

export interface Credentials {
  privateKey: PrivateKeyMaterial;
  certificate?: CertificateMaterial;
}

export interface HostIdentity {
  host: string;
  port: number;
  /** Raw public host key blob as sent by the server. */
  key: Buffer;
}

/**
 * Decides whether a server may be trusted. Invoked once per handshake; returning false aborts
 * the connection with a HandshakeError.
 */
export interface HostKeyPolicy {
  readonly name: string;
  verify(identity: HostIdentity): boolean | Promise<boolean>;
}

export interface HandshakeOptions {
  username: string;
  keyExchange: readonly KexAlgorithmName[];
  hostKeyPolicy: HostKeyPolicy;
  /** Idle window after which the connection is torn down. */
  inactivityTimeoutMs: number;
  /** Upper bound on handshake plus authentication. */
  readyTimeoutMs?: number;
  keepAliveIntervalMs?: number;
}

export type AuthOutcome =
  | { success: true }
  | { success: false; remainingMethods: string[] };

export type ChannelEvent =
  | { kind: 'data'; data: Uint8Array }
  | { kind: 'extended-data'; stream: number; data: Uint8Array }
  | { kind: 'exit-status'; code: number }
  | { kind: 'exit-signal'; signal: string; message?: string }
  | { kind: 'eof' };

export interface ExecChannel {
  /** Requests direct, non-interactive execution of the command string. */
  exec(command: string): Promise<void>;
  /** Events in arrival order; the sequence ends once the peer closes the channel. */
  events(): AsyncIterable<ChannelEvent>;
  close(): Promise<void>;
}

export interface TransportConnection {
  authenticatePublicKey(username: string, key: PrivateKeyMaterial): Promise<AuthOutcome>;
  authenticateCertificate(
    username: string,
    key: PrivateKeyMaterial,
    certificate: CertificateMaterial,
  ): Promise<AuthOutcome>;
  openChannel(): Promise<ExecChannel>;
  /** Sends SSH_MSG_DISCONNECT (reason BY_APPLICATION) and waits for the socket to close. */
  disconnect(): Promise<void>;
  /** Drops the underlying socket immediately. Safe to call more than once. */
  destroy(): void;
}

export interface TransportConnector {
  /** Performs the transport handshake only; authentication is a separate step. */
  connect(target: TransportTarget, options: HandshakeOptions): Promise<TransportConnection>;
}

export function formatTarget(target: TransportTarget): string {
  return `${target.host}:${target.port}`;
}
