import { Debugger } from '../utils/debug'
import { ResourceTracker } from './ResourceTracker'
import { DomainHandle, HypervisorConnection, HypervisorErrorCode, isHypervisorError } from '../types/hypervisor.types'
import { DomainError, DomainErrorCode, NotFoundError, errorMessage } from '../types/errors.types'

/**
 * DomainLookup resolves domains on one request's connection.
 *
 * Every handle it obtains is handed to the request's ResourceTracker as soon
 * as the hypervisor returns it, so no later failure in the request can leak
 * one.
 */
export class DomainLookup {
  private readonly debug: Debugger

  constructor (
    private readonly connection: HypervisorConnection,
    private readonly tracker: ResourceTracker
  ) {
    this.debug = new Debugger('domain-lookup')
  }

  /**
   * Finds a domain by name.
   * @throws NotFoundError when the hypervisor reports no such domain
   * @throws DomainError (LOOKUP_FAILED) for any other failure
   */
  async resolve (name: string): Promise<DomainHandle> {
    let handle: DomainHandle
    try {
      handle = await this.connection.lookupDomainByName(name)
    } catch (error) {
      if (isHypervisorError(error) && error.code === HypervisorErrorCode.NO_DOMAIN) {
        this.debug.log(`Domain not found: ${name}`)
        throw new NotFoundError(name, error.message)
      }
      this.debug.log('error', `Lookup of ${name} failed: ${errorMessage(error)}`)
      throw new DomainError(DomainErrorCode.LOOKUP_FAILED, errorMessage(error), name)
    }

    await this.tracker.register(handle)
    return handle
  }

  /**
   * Lists every domain visible on the connection, in hypervisor order.
   * @throws DomainError (ENUMERATION_FAILED)
   */
  async enumerate (): Promise<DomainHandle[]> {
    let handles: DomainHandle[]
    try {
      handles = await this.connection.listAllDomains()
    } catch (error) {
      this.debug.log('error', `Listing domains failed: ${errorMessage(error)}`)
      throw new DomainError(DomainErrorCode.ENUMERATION_FAILED, errorMessage(error))
    }

    for (const handle of handles) {
      await this.tracker.register(handle)
    }
    this.debug.log(`Enumerated ${handles.length} domain(s)`)
    return handles
  }
}
