import {createGateServerApp} from './app'
import {loadConfig} from './config'
import {runAsEntrypoint} from './entrypoint'

export * from './adminRoutes'
export * from './app'
export * from './cleanupTokens'
export * from './config'
export * from './entrypoint'
export * from './errors'
export * from './http'
export * from './infrastructure'
export * from './runtime'
export * from './siteRoutes'

const serve = async () => {
  const gateServer = await createGateServerApp({config: loadConfig(process.env)})
  await gateServer.start()

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void gateServer.stop().then(() => process.exit(0))
    })
  }
}

runAsEntrypoint(import.meta.url, serve, {
  event: 'process.startup.failed',
  component: 'process.entrypoint',
  message: 'Gate server startup failed',
  reason_code: 'startup_failed'
})
