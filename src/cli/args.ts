import { z } from 'zod';

import { portSchema } from '../config/schema.js';

export const USAGE = `Usage: remote-exec [options] <host> <command> [args...]

Options:
  -p, --port <n>                  TCP port (default 22)
  -u, --username <name>           remote user (default: config, else the local login name)
  -k, --private-key <path>        private key file (required)
  -o, --openssh-certificate <p>   OpenSSH certificate for the private key
  -c, --config <path>             config file (default ~/.config/remote-exec/config.toml)
  -t, --timeout <ms>              inactivity timeout in milliseconds (default 5000)
      --known-hosts <path>        verify the server key against this known_hosts file
      --strict-host-key-checking  verify the server key against the configured known_hosts file
  -v, --verbose                   debug logging
  -h, --help                      show this help

Options are read up to the command; everything from the command on is sent to the remote host.
The key passphrase, if any, is read from REMOTE_EXEC_KEY_PASSPHRASE.`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ValueOption =
  | 'port'
  | 'username'
  | 'privateKeyPath'
  | 'certificatePath'
  | 'configPath'
  | 'inactivityTimeoutMs'
  | 'knownHostsPath';

const VALUE_OPTIONS = new Map<string, ValueOption>([
  ['-p', 'port'],
  ['--port', 'port'],
  ['-u', 'username'],
  ['--username', 'username'],
  ['-k', 'privateKeyPath'],
  ['--private-key', 'privateKeyPath'],
  ['-o', 'certificatePath'],
  ['--openssh-certificate', 'certificatePath'],
  ['-c', 'configPath'],
  ['--config', 'configPath'],
  ['-t', 'inactivityTimeoutMs'],
  ['--timeout', 'inactivityTimeoutMs'],
  ['--known-hosts', 'knownHostsPath'],
]);

const cliArgumentsSchema = z.object({
  host: z.string({ required_error: 'missing <host> argument' }).min(1, 'host must not be empty'),
  command: z.array(z.string()).nonempty('missing <command> argument'),
  port: z.coerce.number().pipe(portSchema).optional(),
  username: z.string().min(1, 'username must not be empty').optional(),
  privateKeyPath: z
    .string({ required_error: '--private-key is required' })
    .min(1, '--private-key must not be empty'),
  certificatePath: z.string().min(1).optional(),
  configPath: z.string().min(1).optional(),
  inactivityTimeoutMs: z.coerce
    .number()
    .int('timeout must be an integer')
    .positive('timeout must be positive')
    .optional(),
  knownHostsPath: z.string().min(1).optional(),
  strictHostKeyChecking: z.boolean(),
  verbose: z.boolean(),
});

export type CliArguments = z.infer<typeof cliArgumentsSchema>;

export type ParsedCommandLine = { kind: 'help' } | { kind: 'run'; args: CliArguments };

function splitInlineValue(token: string): [string, string | undefined] {
  if (!token.startsWith('--')) {
    return [token, undefined];
  }
  const separator = token.indexOf('=');
  if (separator === -1) {
    return [token, undefined];
  }
  return [token.slice(0, separator), token.slice(separator + 1)];
}

/**
 * Reads options up to the command. The first positional is the host; the second positional
 * (or whatever follows `--`) starts the command, and nothing after it is interpreted locally.
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  const values: Partial<Record<ValueOption, string>> = {};
  let host: string | undefined;
  let command: string[] = [];
  let strictHostKeyChecking = false;
  let verbose = false;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? '';

    if (token === '--') {
      const rest = argv.slice(index + 1);
      if (host === undefined) {
        host = rest[0];
        command = rest.slice(1);
      } else {
        command = rest;
      }
      break;
    }

    if (token === '-h' || token === '--help') {
      return { kind: 'help' };
    }
    if (token === '-v' || token === '--verbose') {
      verbose = true;
      continue;
    }
    if (token === '--strict-host-key-checking') {
      strictHostKeyChecking = true;
      continue;
    }

    const [flag, inlineValue] = splitInlineValue(token);
    const option = VALUE_OPTIONS.get(flag);
    if (option) {
      const value = inlineValue ?? argv[index + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      if (inlineValue === undefined) {
        index += 1;
      }
      values[option] = value;
      continue;
    }

    if (token.startsWith('-') && token !== '-') {
      throw new UsageError(`Unknown option: ${token}`);
    }

    if (host === undefined) {
      host = token;
      continue;
    }

    command = argv.slice(index);
    break;
  }

  const result = cliArgumentsSchema.safeParse({
    ...values,
    host,
    command,
    strictHostKeyChecking,
    verbose,
  });
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new UsageError(formatted);
  }

  return { kind: 'run', args: result.data };
}
