import os from 'node:os';

import { parseCommandLine, USAGE, type CliArguments } from './cli/args.js';
import { escapeCommand } from './command/escape.js';
import { loadConfig } from './config/loader.js';
import type { RemoteExecConfig } from './config/types.js';
import { loadCredentials } from './credentials/loader.js';
import { SessionLogger } from './logging/index.js';
import { stderrSink, stdoutSink } from './session/output-sink.js';
import { withSession } from './session/session.js';
import type { SessionDependencies } from './session/types.js';
import { AcceptAnyHostKeyPolicy, KnownHostsPolicy } from './transport/host-key-policy.js';
import { Ssh2Transport } from './transport/ssh2-transport.js';
import type { HostKeyPolicy, TransportConnector } from './transport/types.js';

/** Exit code for any failure that happened on this side of the connection. */
export const LOCAL_FAILURE_EXIT_CODE = 255;

export interface MainOverrides {
  transport?: TransportConnector;
  output?: SessionDependencies['output'];
  errorOutput?: SessionDependencies['errorOutput'];
  printUsage?: (text: string) => void;
}

async function resolveHostKeyPolicy(
  args: CliArguments,
  config: RemoteExecConfig,
  logger: SessionLogger,
): Promise<HostKeyPolicy> {
  const knownHostsPath = args.knownHostsPath ?? config.hostKeys.knownHostsPath;
  if (args.knownHostsPath || args.strictHostKeyChecking || config.hostKeys.strictHostKeyChecking) {
    return KnownHostsPolicy.fromFile(knownHostsPath);
  }
  return new AcceptAnyHostKeyPolicy((identity) => logger.logUnverifiedHostKey(identity));
}

export function resolveUsername(args: CliArguments, config: RemoteExecConfig): string {
  return args.username ?? config.connection.username ?? os.userInfo().username;
}

/**
 * Runs one remote command and resolves to the code the process should exit with. Failures
 * reject; the entry point maps them to LOCAL_FAILURE_EXIT_CODE.
 */
export async function main(argv: readonly string[], overrides: MainOverrides = {}): Promise<number> {
  const parsed = parseCommandLine(argv);
  if (parsed.kind === 'help') {
    (overrides.printUsage ?? console.log)(USAGE);
    return 0;
  }
  const { args } = parsed;

  const config = await loadConfig({ configPath: args.configPath, allowMissing: true });
  const logger = new SessionLogger({
    destination: config.logging.destination,
    level: args.verbose ? 'debug' : config.logging.level,
  });

  const credentials = await loadCredentials({
    privateKeyPath: args.privateKeyPath,
    certificatePath: args.certificatePath,
  });
  const hostKeyPolicy = await resolveHostKeyPolicy(args, config, logger);

  const dependencies: SessionDependencies = {
    transport: overrides.transport ?? new Ssh2Transport(),
    logger,
    output: overrides.output ?? stdoutSink(),
    errorOutput: overrides.errorOutput ?? stderrSink(),
  };

  return withSession(
    {
      credentials,
      username: resolveUsername(args, config),
      target: { host: args.host, port: args.port ?? config.connection.port },
      inactivityTimeoutMs: args.inactivityTimeoutMs ?? config.connection.inactivityTimeoutMs,
      keyExchange: config.connection.keyExchange,
      hostKeyPolicy,
      readyTimeoutMs: config.connection.readyTimeoutMs,
      keepAliveIntervalMs: config.connection.keepAliveIntervalMs,
    },
    dependencies,
    (session) => session.call(escapeCommand(args.command)),
  );
}
