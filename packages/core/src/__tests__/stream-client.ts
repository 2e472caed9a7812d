import test from 'ava'
import {
  AuthenticationError,
  InvalidEndpointError,
  ServerError,
  StreamConnectionError
} from '../errors.js'
import {authorizationHeader, parseEndpoint, StreamClient, type StreamState} from '../stream/stream-client.js'
import {staticSession, startStreamServer} from './helpers.js'

function frames(...messages: Array<Record<string, unknown>>): string[] {
  return messages.map(message => JSON.stringify(message))
}

function recorder() {
  const output: string[] = []
  const statuses: Array<[string, Record<string, unknown>]> = []
  const states: StreamState[] = []
  return {
    output,
    statuses,
    states,
    options: {
      onOutput(data: string) {
        output.push(data)
      },
      onStatus(phase: string, fields: Record<string, unknown>) {
        statuses.push([phase, fields])
      },
      onStateChange(state: StreamState) {
        states.push(state)
      }
    }
  }
}

test('parseEndpoint accepts ws and wss URLs only', t => {
  t.is(parseEndpoint('wss://abc.snowflakecomputing.app').hostname, 'abc.snowflakecomputing.app')
  t.is(parseEndpoint('ws://127.0.0.1:8765').port, '8765')
  t.throws(() => parseEndpoint('https://abc.snowflakecomputing.app'), {instanceOf: InvalidEndpointError})
  t.throws(() => parseEndpoint('not a url'), {instanceOf: InvalidEndpointError, message: 'Invalid WebSocket URL: not a url'})
})

test('authorizationHeader formats a Snowflake token header', t => {
  t.is(authorizationHeader('test-token'), 'Snowflake Token="test-token"')
})

test('stream relays output in order and resolves with the exit code', async t => {
  let authorization: string | undefined
  const server = await startStreamServer((socket, header) => {
    authorization = header
    for (const frame of frames(
      {type: 'status', status: 'started'},
      {type: 'output', data: 'hello\n'},
      {type: 'output', data: 'world\n'},
      {type: 'status', status: 'completed', exit_code: 0}
    )) {
      socket.send(frame)
    }
  })
  t.teardown(server.close)

  const rec = recorder()
  const outcome = await new StreamClient(staticSession('test-token')).stream(server.url, rec.options)

  t.deepEqual(outcome, {status: 'exited', exitCode: 0})
  t.is(authorization, 'Snowflake Token="test-token"')
  t.deepEqual(rec.output, ['hello\n', 'world\n'])
  t.deepEqual(rec.statuses, [
    ['connected', {url: server.url}],
    ['started', {}],
    ['completed', {exit_code: 0}]
  ])
  t.deepEqual(rec.states, ['authenticating', 'connecting', 'connected', 'streaming', 'completed'])
})

test('stream reports a non-zero exit code', async t => {
  const server = await startStreamServer(socket => {
    socket.send(JSON.stringify({type: 'status', status: 'completed', exit_code: 2}))
  })
  t.teardown(server.close)

  const outcome = await new StreamClient(staticSession()).stream(server.url)
  t.deepEqual(outcome, {status: 'exited', exitCode: 2})
})

test('stream resolves as incomplete when the exit code is not an integer', async t => {
  for (const exitCode of [null, 'n/a']) {
    const server = await startStreamServer(socket => {
      socket.send(JSON.stringify({type: 'status', status: 'completed', exit_code: exitCode}))
    })

    try {
      const rec = recorder()
      const outcome = await new StreamClient(staticSession()).stream(server.url, rec.options)
      t.deepEqual(outcome, {status: 'incomplete', reason: 'unknown-exit-code'})
      t.deepEqual(rec.statuses.at(-1), ['completed', {exit_code: exitCode}])
    } finally {
      await server.close()
    }
  }
})

test('stream delivers output in position and returns the completed exit code', async t => {
  const server = await startStreamServer(socket => {
    for (const frame of frames(
      {type: 'status', status: 'starting'},
      {type: 'status', status: 'started', pid: 1},
      {type: 'output', data: 'hi'},
      {type: 'status', status: 'completed', exit_code: 2}
    )) {
      socket.send(frame)
    }
  })
  t.teardown(server.close)

  const events: string[] = []
  const outcome = await new StreamClient(staticSession()).stream(server.url, {
    onOutput(data) {
      events.push(`output:${data}`)
    },
    onStatus(phase) {
      events.push(`status:${phase}`)
    }
  })

  t.deepEqual(outcome, {status: 'exited', exitCode: 2})
  t.deepEqual(events, ['status:connected', 'status:starting', 'status:started', 'output:hi', 'status:completed'])
})

test('stream delivers nothing after a server error', async t => {
  const server = await startStreamServer(socket => {
    for (const frame of frames(
      {type: 'output', data: 'before'},
      {type: 'error', message: 'pty crashed'},
      {type: 'output', data: 'after'}
    )) {
      socket.send(frame)
    }
  })
  t.teardown(server.close)

  const rec = recorder()
  await t.throwsAsync(new StreamClient(staticSession()).stream(server.url, rec.options), {
    instanceOf: ServerError,
    message: 'pty crashed'
  })
  t.deepEqual(rec.output, ['before'])
})

test('stream forwards raw text and unknown frames as output', async t => {
  const server = await startStreamServer(socket => {
    socket.send('raw line')
    socket.send('{"type":"heartbeat"}')
    socket.send(JSON.stringify({type: 'status', status: 'completed'}))
  })
  t.teardown(server.close)

  const rec = recorder()
  await new StreamClient(staticSession()).stream(server.url, rec.options)
  t.deepEqual(rec.output, ['raw line', 'Unknown message type \'heartbeat\': {"type":"heartbeat"}\n'])
})

test('stream fails with the server error', async t => {
  const server = await startStreamServer(socket => {
    socket.send(JSON.stringify({type: 'error', message: 'spawn failed', code: 'E_SPAWN', data: {cmd: 'nextflow'}}))
  })
  t.teardown(server.close)

  const rec = recorder()
  const error = await t.throwsAsync(new StreamClient(staticSession()).stream(server.url, rec.options), {instanceOf: ServerError})

  t.is(error?.message, 'spawn failed (Code: E_SPAWN)')
  t.is(error?.serverCode, 'E_SPAWN')
  t.deepEqual(error?.data, {cmd: 'nextflow'})
  t.is(rec.states.at(-1), 'failed')
})

test('stream resolves as incomplete when the server closes early', async t => {
  const server = await startStreamServer(socket => {
    socket.send(JSON.stringify({type: 'output', data: 'partial\n'}))
    socket.close(1011, 'pty exited')
  })
  t.teardown(server.close)

  const rec = recorder()
  const outcome = await new StreamClient(staticSession()).stream(server.url, rec.options)

  t.deepEqual(outcome, {status: 'incomplete', reason: 'closed'})
  t.deepEqual(rec.output, ['partial\n'])
  t.deepEqual(rec.statuses.at(-1), ['disconnected', {reason: 'pty exited', code: 1011}])
  t.is(rec.states.at(-1), 'disconnected')
})

test('stream resolves as cancelled when aborted mid-run', async t => {
  const server = await startStreamServer(socket => {
    socket.send(JSON.stringify({type: 'output', data: 'running\n'}))
  })
  t.teardown(server.close)

  const controller = new AbortController()
  const rec = recorder()
  const outcome = await new StreamClient(staticSession()).stream(server.url, {
    ...rec.options,
    signal: controller.signal,
    onOutput(data) {
      rec.output.push(data)
      controller.abort()
    }
  })

  t.deepEqual(outcome, {status: 'incomplete', reason: 'cancelled'})
  t.deepEqual(rec.statuses.at(-1), ['disconnected', {reason: 'Disconnected by user'}])
  t.is(rec.states.at(-1), 'cancelled')
})

test('stream does not connect when already aborted', async t => {
  let issued = false
  const controller = new AbortController()
  controller.abort()
  const rec = recorder()

  const outcome = await new StreamClient({
    async issueToken() {
      issued = true
      return 'test-token'
    }
  }).stream('wss://unreachable.invalid', {...rec.options, signal: controller.signal})

  t.deepEqual(outcome, {status: 'incomplete', reason: 'cancelled'})
  t.false(issued)
  t.deepEqual(rec.states, ['cancelled'])
})

test('stream maps a 401 handshake to an authentication error', async t => {
  const server = await startStreamServer(() => {
    t.fail('connection should have been rejected')
  }, {rejectWith: 401})
  t.teardown(server.close)

  await t.throwsAsync(new StreamClient(staticSession()).stream(server.url), {
    instanceOf: AuthenticationError,
    message: 'Authentication failed (HTTP 401). Check your Snowflake connection.'
  })
})

test('stream maps a 403 handshake to an authentication error', async t => {
  const server = await startStreamServer(() => {
    t.fail('connection should have been rejected')
  }, {rejectWith: 403})
  t.teardown(server.close)

  await t.throwsAsync(new StreamClient(staticSession()).stream(server.url), {
    instanceOf: AuthenticationError,
    message: 'Authentication failed (HTTP 403). Check your Snowflake connection.'
  })
})

test('stream maps other handshake rejections to connection errors', async t => {
  const server = await startStreamServer(() => {
    t.fail('connection should have been rejected')
  }, {rejectWith: 500})
  t.teardown(server.close)

  const rec = recorder()
  await t.throwsAsync(new StreamClient(staticSession()).stream(server.url, rec.options), {
    instanceOf: StreamConnectionError,
    message: 'Connection handshake failed: unexpected server response 500'
  })
  t.deepEqual(rec.states, ['authenticating', 'connecting', 'failed'])
})

test('stream wraps session failures as authentication errors', async t => {
  const client = new StreamClient({
    async issueToken() {
      throw new Error('connection "dev" not found')
    }
  })

  await t.throwsAsync(client.stream('wss://abc.snowflakecomputing.app'), {
    instanceOf: AuthenticationError,
    message: 'Failed to get authentication token: connection "dev" not found'
  })
})

test('stream rejects an invalid URL before asking for a token', async t => {
  let issued = false
  const client = new StreamClient({
    async issueToken() {
      issued = true
      return 'test-token'
    }
  })

  await t.throwsAsync(client.stream('https://abc.snowflakecomputing.app'), {instanceOf: InvalidEndpointError})
  t.false(issued)
})

test('stream fails to connect to a closed port', async t => {
  const server = await startStreamServer(() => {})
  await server.close()

  await t.throwsAsync(new StreamClient(staticSession()).stream(server.url), {instanceOf: StreamConnectionError})
})
