import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@token-gate/logging'

export const serviceName = 'gate-server'

type FailureEvent = {
  event: string
  component: string
  message: string
  reason_code: string
}

export const isEntrypoint = (moduleUrl: string, argv: readonly string[] = process.argv) =>
  argv[1] !== undefined && fileURLToPath(moduleUrl) === argv[1]

const nodeEnvOf = (value: string | undefined) =>
  value === 'production' || value === 'test' ? value : 'development'

/** Runs `main` when `moduleUrl` is the script node was started with; a rejection is logged and exits 1. */
export const runAsEntrypoint = (moduleUrl: string, main: () => Promise<void>, failure: FailureEvent) => {
  if (!isEntrypoint(moduleUrl)) {
    return
  }

  void main().catch((error: unknown) => {
    createStructuredLogger({service: serviceName, env: nodeEnvOf(process.env.NODE_ENV), level: 'error'}).fatal({
      ...failure,
      metadata: {error}
    })
    process.exit(1)
  })
}
