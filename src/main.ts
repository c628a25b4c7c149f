#!/usr/bin/env node
import { buildServer } from './api/server'
import { loadServerConfig } from './config/ServerConfig'
import { VirshClient } from './core/VirshClient'
import { Debugger } from './utils/debug'
import { errorMessage } from './types/errors.types'

const debug = new Debugger('main')

async function main (): Promise<void> {
  const config = loadServerConfig()
  const app = buildServer({
    client: new VirshClient({ binary: config.virshBinary }),
    hypervisorUri: config.hypervisorUri
  })

  const shutdown = (signal: NodeJS.Signals): void => {
    debug.log(`Received ${signal}, closing server`)
    app.close().then(
      () => debug.log('Server closed'),
      (error: unknown) => {
        debug.log('error', `Error while closing server: ${errorMessage(error)}`)
        process.exitCode = 1
      }
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  const address = await app.listen({ host: config.host, port: config.port })
  debug.log(`Listening on ${address}, hypervisor ${config.hypervisorUri}`)
}

main().catch((error: unknown) => {
  debug.log('error', `Startup failed: ${errorMessage(error)}`)
  console.error(`domgate: ${errorMessage(error)}`)
  process.exitCode = 1
})
