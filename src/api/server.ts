import Fastify, { FastifyError, FastifyInstance } from 'fastify'
import { Debugger } from '../utils/debug'
import { DomainHandlers, ErrorBody, INTERNAL_ERROR_CODE } from './DomainHandlers'
import { HypervisorClient } from '../types/hypervisor.types'
import { isDomainAction } from '../types/domain.types'

/** Code returned for requests that match no route */
export const ROUTE_NOT_FOUND_CODE = 'ROUTE_NOT_FOUND'

/**
 * Options for buildServer
 */
export interface ServerOptions {
  /** Hypervisor client every request opens its session through */
  client: HypervisorClient
  /** Endpoint to open sessions against */
  hypervisorUri: string
}

interface DomainParams {
  name: string
}

interface ActionParams extends DomainParams {
  action: string
}

/**
 * Builds the HTTP application.
 *
 * | Method | Path                      |
 * |--------|---------------------------|
 * | GET    | /ping                     |
 * | GET    | /domains                  |
 * | GET    | /domains/:name            |
 * | POST   | /domains/:name/:action    |
 *
 * An action outside DOMAIN_ACTIONS is answered as an unmatched route before
 * any session is opened.
 *
 * @example
 * ```typescript
 * const app = buildServer({ client: new VirshClient(), hypervisorUri: 'qemu:///system' })
 * await app.listen({ host: '0.0.0.0', port: 8080 })
 * ```
 */
export function buildServer (options: ServerOptions): FastifyInstance {
  const debug = new Debugger('http')
  const handlers = new DomainHandlers(options.client, { hypervisorUri: options.hypervisorUri })
  const app = Fastify({ logger: false })

  app.addHook('onResponse', async (request, reply) => {
    debug.log(`${request.method} ${request.url} -> ${reply.statusCode}`)
  })

  app.setNotFoundHandler((request, reply) => {
    const body: ErrorBody = {
      error: `Route ${request.method} ${request.url} not found`,
      code: ROUTE_NOT_FOUND_CODE
    }
    reply.code(404).send(body)
  })

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = error.statusCode ?? 500
    debug.log('error', `${request.method} ${request.url} failed: ${error.message}`)
    const body: ErrorBody = status >= 500
      ? { error: 'Internal server error', code: INTERNAL_ERROR_CODE }
      : { error: error.message, code: error.code }
    reply.code(status).send(body)
  })

  app.get('/ping', async (_request, reply) => {
    reply.type('text/plain')
    return 'pong'
  })

  app.get('/domains', async (_request, reply) => {
    const { status, body } = await handlers.list()
    return reply.code(status).send(body)
  })

  app.get<{ Params: DomainParams }>('/domains/:name', async (request, reply) => {
    const { status, body } = await handlers.get(request.params.name)
    return reply.code(status).send(body)
  })

  app.post<{ Params: ActionParams }>('/domains/:name/:action', async (request, reply) => {
    const { name, action } = request.params
    if (!isDomainAction(action)) {
      reply.callNotFound()
      return reply
    }
    const { status, body } = await handlers.performAction(name, action)
    return reply.code(status).send(body)
  })

  return app
}
