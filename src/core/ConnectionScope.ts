import { Debugger } from '../utils/debug'
import { ResourceTracker } from './ResourceTracker'
import { DomainLookup } from './DomainLookup'
import { DescriptorBuilder } from './DescriptorBuilder'
import { ActionDispatcher } from './ActionDispatcher'
import { DomainXmlParser } from '../parser/DomainXmlParser'
import { HypervisorClient, HypervisorConnection } from '../types/hypervisor.types'
import { ConnectionError, errorMessage } from '../types/errors.types'

/**
 * ConnectionScope owns one hypervisor management session for the duration
 * of a single request. Sessions are never shared between requests.
 */
export class ConnectionScope {
  private static readonly debug = new Debugger('connection-scope')
  private closed: boolean = false

  private constructor (readonly connection: HypervisorConnection) {}

  /**
   * Opens a session.
   * @throws ConnectionError when the endpoint is unreachable or refuses the session
   */
  static async acquire (client: HypervisorClient, uri: string): Promise<ConnectionScope> {
    try {
      const connection = await client.open(uri)
      ConnectionScope.debug.log(`Opened session to ${uri}`)
      return new ConnectionScope(connection)
    } catch (error) {
      ConnectionScope.debug.log('error', `Cannot open session to ${uri}: ${errorMessage(error)}`)
      throw new ConnectionError(`Failed to connect to hypervisor at ${uri}: ${errorMessage(error)}`, { uri })
    }
  }

  get released (): boolean {
    return this.closed
  }

  /**
   * Closes the session. Safe to call more than once; a failing close is
   * logged, not thrown.
   */
  async release (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true

    try {
      await this.connection.close()
      ConnectionScope.debug.log(`Closed session to ${this.connection.uri}`)
    } catch (error) {
      ConnectionScope.debug.log('error', `Closing session to ${this.connection.uri} failed: ${errorMessage(error)}`)
    }
  }
}

/**
 * Everything a handler needs to work on one request
 */
export interface RequestScope {
  readonly connection: HypervisorConnection
  readonly tracker: ResourceTracker
  readonly lookup: DomainLookup
  readonly builder: DescriptorBuilder
  readonly dispatcher: ActionDispatcher
}

/**
 * Runs `fn` with a freshly opened session and a fresh resource tracker.
 *
 * However `fn` exits, the tracker is drained and then the session is closed,
 * exactly once each. `fn` must not leave hypervisor calls running when it
 * settles, since the handles they use are released right after.
 *
 * @param label - Names the request in log output
 * @throws ConnectionError before `fn` runs when the session cannot be opened
 *
 * @example
 * ```typescript
 * const descriptor = await withRequestScope(client, 'qemu:///system', 'GET /domains/vm1', async (scope) => {
 *   const handle = await scope.lookup.resolve('vm1')
 *   return scope.builder.build(handle)
 * })
 * ```
 */
export async function withRequestScope<T> (
  client: HypervisorClient,
  uri: string,
  label: string,
  fn: (scope: RequestScope) => Promise<T>,
  parser: DomainXmlParser = new DomainXmlParser()
): Promise<T> {
  const connectionScope = await ConnectionScope.acquire(client, uri)
  const tracker = new ResourceTracker(label)

  try {
    const builder = new DescriptorBuilder(tracker, parser)
    return await fn({
      connection: connectionScope.connection,
      tracker,
      lookup: new DomainLookup(connectionScope.connection, tracker),
      builder,
      dispatcher: new ActionDispatcher(builder)
    })
  } finally {
    await tracker.drain()
    await connectionScope.release()
  }
}
