export type RemoteExecErrorCode =
  | 'credential'
  | 'handshake'
  | 'auth'
  | 'protocol'
  | 'io'
  | 'transport'
  | 'timeout'
  | 'state';

export class RemoteExecError extends Error {
  constructor(
    readonly code: RemoteExecErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RemoteExecError';
  }
}

/** Key or certificate could not be read, parsed, or paired. Raised before any network activity. */
export class CredentialError extends RemoteExecError {
  constructor(
    readonly sourcePath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super('credential', message, options);
    this.name = 'CredentialError';
  }
}

export class HandshakeError extends RemoteExecError {
  constructor(message: string, options?: ErrorOptions) {
    super('handshake', message, options);
    this.name = 'HandshakeError';
  }
}

export type AuthMethod = 'publickey' | 'certificate';

export class AuthenticationError extends RemoteExecError {
  constructor(
    readonly method: AuthMethod,
    readonly username: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super('auth', message, options);
    this.name = 'AuthenticationError';
  }
}

/** The channel closed without the peer ever reporting an exit status. */
export class ProtocolConsistencyError extends RemoteExecError {
  constructor(message: string, options?: ErrorOptions) {
    super('protocol', message, options);
    this.name = 'ProtocolConsistencyError';
  }
}

export class OutputError extends RemoteExecError {
  constructor(message: string, options?: ErrorOptions) {
    super('io', message, options);
    this.name = 'OutputError';
  }
}

export class TransportError extends RemoteExecError {
  constructor(message: string, options?: ErrorOptions) {
    super('transport', message, options);
    this.name = 'TransportError';
  }
}

export class InactivityTimeoutError extends RemoteExecError {
  constructor(
    readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super('timeout', `No traffic for ${timeoutMs}ms; connection terminated`, options);
    this.name = 'InactivityTimeoutError';
  }
}

export class SessionStateError extends RemoteExecError {
  constructor(message: string) {
    super('state', message);
    this.name = 'SessionStateError';
  }
}

type WrappingError = new (message: string, options?: ErrorOptions) => RemoteExecError;

/**
 * Wraps a foreign error into the taxonomy. Errors that already belong to it pass through
 * unchanged so the most specific classification wins.
 */
export function enrichError(
  error: unknown,
  ErrorClass: WrappingError,
  target: string,
): RemoteExecError {
  if (error instanceof RemoteExecError) {
    return error;
  }

  if (error instanceof Error) {
    return new ErrorClass(`${error.message} (target: ${target})`, { cause: error });
  }

  return new ErrorClass(`Unknown error on ${target}: ${String(error)}`);
}

/** Failures after which the connection can no longer be used. */
export function isConnectionFailure(error: unknown): boolean {
  return error instanceof TransportError || error instanceof InactivityTimeoutError;
}
