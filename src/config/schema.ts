import { z } from 'zod';

import { DEFAULT_KEX_ALGORITHMS, DEFAULT_READY_TIMEOUT_MS, KEX_ALGORITHMS } from '../transport/types.js';
import type { RemoteExecConfig } from './types.js';

export const DEFAULT_PORT = 22;
export const DEFAULT_INACTIVITY_TIMEOUT_MS = 5_000;

const positiveInt = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`);

export const portSchema = z
  .number({ invalid_type_error: 'port must be a number' })
  .int('port must be an integer')
  .min(1, 'port must be >= 1')
  .max(65535, 'port must be <= 65535');

const connectionSchema = z
  .object({
    port: portSchema.optional(),
    username: z.string().min(1, 'username must not be empty').optional(),
    inactivityTimeoutMs: positiveInt('inactivityTimeoutMs').optional(),
    readyTimeoutMs: positiveInt('readyTimeoutMs').optional(),
    keepAliveIntervalMs: positiveInt('keepAliveIntervalMs').optional(),
    keyExchange: z
      .array(z.enum(KEX_ALGORITHMS))
      .nonempty('keyExchange must list at least one algorithm')
      .optional(),
  })
  .strict();

const hostKeysSchema = z
  .object({
    strictHostKeyChecking: z.boolean().optional(),
    knownHostsPath: z.string().min(1).optional(),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    destination: z.string().min(1).optional(),
  })
  .strict();

export const remoteExecConfigSchema = z
  .object({
    connection: connectionSchema.optional(),
    hostKeys: hostKeysSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict();

export function coerceConfig(input: unknown): RemoteExecConfig {
  const parseResult = remoteExecConfigSchema.safeParse(input);

  if (!parseResult.success) {
    const formatted = parseResult.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid remote-exec configuration:\n${formatted}`);
  }

  const { connection = {}, hostKeys = {}, logging = {} } = parseResult.data;

  return {
    connection: {
      port: connection.port ?? DEFAULT_PORT,
      username: connection.username,
      inactivityTimeoutMs: connection.inactivityTimeoutMs ?? DEFAULT_INACTIVITY_TIMEOUT_MS,
      readyTimeoutMs: connection.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
      keepAliveIntervalMs: connection.keepAliveIntervalMs,
      keyExchange: connection.keyExchange ?? [...DEFAULT_KEX_ALGORITHMS],
    },
    hostKeys: {
      strictHostKeyChecking: hostKeys.strictHostKeyChecking ?? false,
      knownHostsPath: hostKeys.knownHostsPath,
    },
    logging: {
      level: logging.level ?? 'info',
      destination: logging.destination,
    },
  } satisfies RemoteExecConfig;
}
