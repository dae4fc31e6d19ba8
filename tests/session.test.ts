import { describe, expect, it } from 'vitest';

import { Session, withSession } from '../src/session/session.js';
import {
  AuthenticationError,
  HandshakeError,
  OutputError,
  ProtocolConsistencyError,
  SessionStateError,
  TransportError,
} from '../src/transport/errors.js';
import {
  FailingSink,
  FakeTransport,
  MemorySink,
  createConnectOptions,
  createCredentials,
  data,
  exitStatus,
  silentLogger,
  type FakeScript,
} from './helpers/fake-transport.js';

async function connect(script: FakeScript, withCertificate = false) {
  const transport = new FakeTransport(script);
  const output = new MemorySink();
  const errorOutput = new MemorySink();
  const session = await Session.connect(createConnectOptions(createCredentials(withCertificate)), {
    transport,
    logger: silentLogger(),
    output,
    errorOutput,
  });
  return { session, transport, connection: transport.connections[0], output, errorOutput };
}

describe('Session.connect', () => {
  it('forwards the handshake settings to the transport', async () => {
    const { transport, session } = await connect({});

    expect(transport.handshakes).toHaveLength(1);
    expect(transport.handshakes[0].target).toEqual({ host: 'example.test', port: 22 });
    expect(transport.handshakes[0].options).toMatchObject({
      username: 'deploy',
      keyExchange: ['curve25519-sha256'],
      inactivityTimeoutMs: 5_000,
    });
    expect(transport.handshakes[0].options.hostKeyPolicy.name).toBe('accept-any');
    expect(session.status).toBe('idle');
  });

  it('authenticates with the bare public key when no certificate is loaded', async () => {
    const { connection } = await connect({});

    expect(connection.authCalls).toEqual([{ method: 'publickey', username: 'deploy' }]);
  });

  it('authenticates with the certificate, and only the certificate, when one is loaded', async () => {
    const { connection } = await connect({}, true);

    expect(connection.authCalls).toEqual([{ method: 'certificate', username: 'deploy' }]);
  });

  it('wraps handshake failures into HandshakeError', async () => {
    const transport = new FakeTransport({ handshakeError: new Error('no matching key exchange method') });

    const attempt = Session.connect(createConnectOptions(createCredentials()), {
      transport,
      logger: silentLogger(),
      output: new MemorySink(),
    });

    await expect(attempt).rejects.toBeInstanceOf(HandshakeError);
    await expect(attempt).rejects.toThrow(
      'no matching key exchange method (target: example.test:22)',
    );
  });

  it('releases the connection and reports the method when authentication is rejected', async () => {
    const transport = new FakeTransport({
      authOutcome: { success: false, remainingMethods: ['password', 'keyboard-interactive'] },
    });

    const error = await Session.connect(createConnectOptions(createCredentials(true)), {
      transport,
      logger: silentLogger(),
      output: new MemorySink(),
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({
      method: 'certificate',
      username: 'deploy',
      code: 'auth',
      message:
        'Authentication (with publickey+certificate) failed for deploy@example.test:22; ' +
        'server still accepts: password,keyboard-interactive',
    });
    expect(transport.connections[0].destroyCount).toBe(1);
  });
});

describe('Session.call', () => {
  it('writes every data fragment in order, including data after the exit status', async () => {
    const { session, output, connection } = await connect({
      events: [data('foo'), data('bar'), exitStatus(0), data('baz')],
    });

    await expect(session.call('echo foobarbaz')).resolves.toBe(0);

    expect(output.text()).toBe('foobarbaz');
    expect(connection.channels[0].command).toBe('echo foobarbaz');
    expect(connection.channels[0].closeCount).toBe(1);
    expect(session.status).toBe('idle');
  });

  it('returns the remote exit code unchanged', async () => {
    const { session } = await connect({ events: [exitStatus(42)] });

    await expect(session.call('false')).resolves.toBe(42);
  });

  it('fails with ProtocolConsistencyError when the channel closes without an exit status', async () => {
    const { session, output } = await connect({ events: [data('partial')] });

    await expect(session.call('cat')).rejects.toBeInstanceOf(ProtocolConsistencyError);
    expect(output.text()).toBe('partial');
    expect(session.status).toBe('idle');
  });

  it('routes stderr to the error sink and skips signal and eof events', async () => {
    const { session, output, errorOutput } = await connect({
      events: [
        data('out'),
        { kind: 'extended-data', stream: 1, data: Buffer.from('err') },
        { kind: 'eof' },
        { kind: 'exit-signal', signal: 'TERM' },
        exitStatus(1),
      ],
    });

    await expect(session.call('run')).resolves.toBe(1);
    expect(output.text()).toBe('out');
    expect(errorOutput.text()).toBe('err');
  });

  it('runs commands one after another on the same connection', async () => {
    const { session, connection, output } = await connect({ events: [data('x'), exitStatus(0)] });

    await session.call('first');
    await session.call('second');

    expect(connection.channels.map((channel) => channel.command)).toEqual(['first', 'second']);
    expect(output.text()).toBe('xx');
  });

  it('rejects a second call while one is in flight', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { session } = await connect({ gate, events: [exitStatus(0)] });

    const first = session.call('sleep 1');
    await expect(session.call('date')).rejects.toThrow(
      new SessionStateError('A command is already running on this session'),
    );
    expect(session.status).toBe('channel-open');

    release();
    await expect(first).resolves.toBe(0);
    expect(session.status).toBe('idle');
  });

  it('aborts with OutputError when the local sink fails', async () => {
    const transport = new FakeTransport({ events: [data('x'), exitStatus(0)] });
    const session = await Session.connect(createConnectOptions(createCredentials()), {
      transport,
      logger: silentLogger(),
      output: new FailingSink(),
    });

    const error = await session.call('yes').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OutputError);
    expect(error).toMatchObject({ message: 'Failed to write remote output to local stdout' });
    expect(transport.connections[0].channels[0].closeCount).toBe(1);
    expect(session.status).toBe('idle');
  });

  it('closes the session when the transport fails mid-call', async () => {
    const { session, connection } = await connect({
      events: [data('x')],
      failWith: new TransportError('connection reset'),
    });

    await expect(session.call('tail -f log')).rejects.toBeInstanceOf(TransportError);

    expect(session.status).toBe('closed');
    expect(connection.disconnectCount).toBe(1);
    expect(connection.destroyCount).toBe(1);
    await expect(session.call('date')).rejects.toThrow(new SessionStateError('Session is closed'));
  });

  it('keeps the session usable when the channel cannot be opened', async () => {
    const { session, connection } = await connect({
      openError: new Error('administratively prohibited'),
    });

    await expect(session.call('date')).rejects.toThrow('administratively prohibited');
    expect(session.status).toBe('idle');
    expect(connection.destroyCount).toBe(0);
  });
});

describe('Session.close', () => {
  it('always releases the connection even when the disconnect notice fails', async () => {
    const { session, connection } = await connect({ disconnectError: new Error('socket hang up') });

    await expect(session.close()).resolves.toBeUndefined();

    expect(connection.disconnectCount).toBe(1);
    expect(connection.destroyCount).toBe(1);
    expect(session.status).toBe('closed');
  });

  it('is idempotent', async () => {
    const { session, connection } = await connect({});

    await session.close();
    await session.close();

    expect(connection.disconnectCount).toBe(1);
    expect(connection.destroyCount).toBe(1);
  });
});

describe('withSession', () => {
  it('closes the session when the callback throws', async () => {
    const transport = new FakeTransport({});

    await expect(
      withSession(
        createConnectOptions(createCredentials()),
        { transport, logger: silentLogger(), output: new MemorySink() },
        async () => {
          throw new Error('callback failed');
        },
      ),
    ).rejects.toThrow('callback failed');

    expect(transport.connections[0].disconnectCount).toBe(1);
    expect(transport.connections[0].destroyCount).toBe(1);
  });

  it('resolves to the callback result', async () => {
    const transport = new FakeTransport({ events: [exitStatus(7)] });

    const code = await withSession(
      createConnectOptions(createCredentials()),
      { transport, logger: silentLogger(), output: new MemorySink() },
      (session) => session.call('exit 7'),
    );

    expect(code).toBe(7);
  });
});
