import { Debugger } from '../utils/debug'
import { DescriptorBuilder } from './DescriptorBuilder'
import { DomainHandle } from '../types/hypervisor.types'
import { DomainAction, DomainDescriptor } from '../types/domain.types'
import { ActionError, errorMessage } from '../types/errors.types'

/**
 * ActionDispatcher forwards a lifecycle action to the hypervisor and
 * re-snapshots the domain afterwards.
 *
 * Transitions are not validated here. The hypervisor decides whether, say,
 * suspending a shut-off domain is legal, and its refusal is passed back
 * unchanged as an ActionError.
 *
 * ```
 * shutoff --create-->   running
 * running --destroy-->  shutoff
 * running --shutdown--> (in shutdown) --> shutoff
 * running --suspend-->  paused
 * paused  --resume-->   running
 * running --reboot-->   running
 * ```
 */
export class ActionDispatcher {
  private readonly debug: Debugger

  constructor (private readonly builder: DescriptorBuilder) {
    this.debug = new Debugger('action-dispatcher')
  }

  /**
   * @throws ActionError when the hypervisor rejects the transition
   * @throws DescriptorError | StateMappingError when the follow-up snapshot fails
   */
  async dispatch (handle: DomainHandle, action: DomainAction): Promise<DomainDescriptor> {
    this.debug.log(`${action} ${handle.ref}`)

    try {
      await this.invoke(handle, action)
    } catch (error) {
      this.debug.log('error', `${action} ${handle.ref} rejected: ${errorMessage(error)}`)
      throw new ActionError(action, errorMessage(error), handle.ref)
    }

    return this.builder.build(handle)
  }

  private invoke (handle: DomainHandle, action: DomainAction): Promise<void> {
    switch (action) {
      case 'create':
        return handle.create()
      case 'destroy':
        return handle.destroy()
      case 'reboot':
        return handle.reboot()
      case 'resume':
        return handle.resume()
      case 'suspend':
        return handle.suspend()
      case 'shutdown':
        return handle.shutdown()
      default: {
        const unhandled: never = action
        throw new Error(`Unhandled domain action: ${String(unhandled)}`)
      }
    }
  }
}
