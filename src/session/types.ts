import type { SessionLogger } from '../logging/index.js';
import type {
  Credentials,
  HostKeyPolicy,
  KexAlgorithmName,
  TransportConnector,
  TransportTarget,
} from '../transport/types.js';
import type { OutputSink } from './output-sink.js';

export interface ConnectOptions {
  credentials: Credentials;
  username: string;
  target: TransportTarget;
  inactivityTimeoutMs: number;
  keyExchange: readonly KexAlgorithmName[];
  hostKeyPolicy: HostKeyPolicy;
  readyTimeoutMs?: number;
  keepAliveIntervalMs?: number;
}

export interface SessionDependencies {
  transport: TransportConnector;
  logger: SessionLogger;
  /** Receives remote stdout. */
  output: OutputSink;
  /** Receives remote stderr; stderr is dropped when absent. */
  errorOutput?: OutputSink;
}

export interface ExecutionResult {
  exitCode: number;
  bytesWritten: number;
  durationMs: number;
}

export interface CallMetadata {
  /** Opaque identifier for correlating log lines of one call. */
  invocationId: string;
  startedAt: Date;
}
