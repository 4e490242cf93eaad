import type {Server} from 'node:http'

export type GateRuntime = {
  server: Server
  start: () => Promise<void>
  stop: () => Promise<void>
}

/**
 * Binds the gate's HTTP server. `stop` also resolves for a server that never
 * started listening.
 */
export const createGateRuntime = ({server, host, port}: {server: Server; host: string; port: number}): GateRuntime => ({
  server,
  start: () =>
    new Promise<void>((resolve, reject) => {
      const onListenError = (error: Error) => reject(error)
      server.once('error', onListenError)
      server.listen({host, port}, () => {
        server.removeListener('error', onListenError)
        resolve()
      })
    }),
  stop: () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve()
        return
      }

      server.close(error => (error ? reject(error) : resolve()))
      server.closeIdleConnections()
    })
})
