import {createServer} from 'node:http'

import {describe, expect, it} from 'vitest'

import {createGateRuntime} from '../runtime'

describe('gate runtime', () => {
  it('listens on the requested address and stops cleanly', async () => {
    const server = createServer((_req, res) => {
      res.end('ok')
    })
    const runtime = createGateRuntime({server, host: '127.0.0.1', port: 0})

    await runtime.start()
    expect(server.listening).toBe(true)
    const address = server.address()
    if (!address || typeof address === 'string') {
      throw new Error('expected tcp address')
    }

    const response = await fetch(`http://127.0.0.1:${String(address.port)}/`)
    expect(await response.text()).toBe('ok')

    await runtime.stop()
    expect(server.listening).toBe(false)
  })

  it('resolves stop for a server that never started', async () => {
    const runtime = createGateRuntime({server: createServer(), host: '127.0.0.1', port: 0})

    await expect(runtime.stop()).resolves.toBeUndefined()
  })

  it('rejects start when the port is taken', async () => {
    const first = createGateRuntime({server: createServer(), host: '127.0.0.1', port: 0})
    await first.start()
    const address = first.server.address()
    if (!address || typeof address === 'string') {
      throw new Error('expected tcp address')
    }

    const second = createGateRuntime({server: createServer(), host: '127.0.0.1', port: address.port})
    try {
      await expect(second.start()).rejects.toThrow(/EADDRINUSE/u)
    } finally {
      await first.stop()
    }
  })
})
