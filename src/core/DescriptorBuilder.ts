import { Debugger } from '../utils/debug'
import { deepFreeze } from '../utils/freeze'
import { ResourceTracker } from './ResourceTracker'
import { DomainXmlParser } from '../parser/DomainXmlParser'
import { DomainHandle } from '../types/hypervisor.types'
import { DomainDescriptor, DomainDefinition, mapDomainState } from '../types/domain.types'
import { DescriptorError, DomainErrorCode, errorMessage } from '../types/errors.types'

/**
 * DescriptorBuilder snapshots a live domain handle into a DomainDescriptor.
 *
 * Steps, none of them retried:
 * 1. register the handle with the request's tracker
 * 2. fetch the descriptor markup
 * 3. parse it
 * 4. query the run-state code
 * 5. map the code to a label (unknown codes fail, they never default)
 *
 * The result is deep-frozen and reflects the hypervisor at the time of the
 * calls; later changes are not tracked.
 */
export class DescriptorBuilder {
  private readonly debug: Debugger

  constructor (
    private readonly tracker: ResourceTracker,
    private readonly parser: DomainXmlParser = new DomainXmlParser()
  ) {
    this.debug = new Debugger('descriptor-builder')
  }

  /**
   * @throws DescriptorError when markup or state cannot be fetched or parsed
   * @throws StateMappingError when the state code has no label
   */
  async build (handle: DomainHandle): Promise<DomainDescriptor> {
    await this.tracker.register(handle)

    let xml: string
    try {
      xml = await handle.getXMLDesc()
    } catch (error) {
      this.debug.log('error', `Fetching descriptor of ${handle.ref} failed: ${errorMessage(error)}`)
      throw new DescriptorError(DomainErrorCode.DESCRIPTOR_FETCH_FAILED, errorMessage(error), handle.ref)
    }

    const definition: DomainDefinition = this.parser.parse(xml)

    let code: number
    try {
      code = await handle.getState()
    } catch (error) {
      this.debug.log('error', `Querying state of ${handle.ref} failed: ${errorMessage(error)}`)
      throw new DescriptorError(DomainErrorCode.STATE_QUERY_FAILED, errorMessage(error), handle.ref)
    }

    const state = mapDomainState(code, definition.name)
    this.debug.log(`Built descriptor for ${definition.name} (${state})`)

    return deepFreeze({ ...definition, state })
  }
}
