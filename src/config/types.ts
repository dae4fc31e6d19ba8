import type { pino } from 'pino';

import type { KexAlgorithmName } from '../transport/types.js';

export interface ConnectionConfig {
  port: number;
  /** Remote user when none is given on the command line. */
  username?: string;
  /** Idle window in ms after which the connection is dropped. */
  inactivityTimeoutMs: number;
  /** Upper bound in ms on handshake plus authentication. */
  readyTimeoutMs: number;
  keepAliveIntervalMs?: number;
  keyExchange: KexAlgorithmName[];
}

export interface HostKeyConfig {
  strictHostKeyChecking: boolean;
  /** Defaults to ~/.ssh/known_hosts when strict checking is on. */
  knownHostsPath?: string;
}

export interface LoggingConfig {
  level: pino.LevelWithSilent;
  /** File to append logs to; stderr when unset. */
  destination?: string;
}

export interface RemoteExecConfig {
  connection: ConnectionConfig;
  hostKeys: HostKeyConfig;
  logging: LoggingConfig;
}

export interface LoadConfigOptions {
  /** Override config path; defaults to env or standard location. */
  configPath?: string;
  /** If true, a missing config file resolves to the defaults instead of throwing. */
  allowMissing?: boolean;
}
