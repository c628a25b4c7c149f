import { Debugger } from '../utils/debug'
import { RequestScope, withRequestScope } from '../core/ConnectionScope'
import { DomainXmlParser } from '../parser/DomainXmlParser'
import { HypervisorClient } from '../types/hypervisor.types'
import { DomainAction, DomainDescriptor } from '../types/domain.types'
import { NotFoundError, errorMessage, isDomainError } from '../types/errors.types'

/** Code returned for failures that are not domain errors */
export const INTERNAL_ERROR_CODE = 'INTERNAL_ERROR'

/**
 * JSON error body
 */
export interface ErrorBody {
  error: string
  code: string
}

export type HandlerResponse<T> =
  | { status: 200, body: T }
  | { status: 404 | 500, body: ErrorBody }

/**
 * Options for DomainHandlers
 */
export interface DomainHandlersOptions {
  /** Endpoint each request opens its session against */
  hypervisorUri: string
}

/**
 * Converts a thrown value into a status and error body. Domain errors keep
 * their message and code; anything else is reported generically.
 */
export function toErrorResponse (error: unknown): { status: 404 | 500, body: ErrorBody } {
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.message, code: error.code } }
  }
  if (isDomainError(error)) {
    return { status: 500, body: { error: error.message, code: error.code } }
  }
  return { status: 500, body: { error: 'Internal server error', code: INTERNAL_ERROR_CODE } }
}

/**
 * DomainHandlers composes the request core into the three API operations.
 * Each call opens its own session and tracker; results are either complete
 * or an error body, never partial.
 */
export class DomainHandlers {
  private readonly debug: Debugger
  private readonly parser: DomainXmlParser

  constructor (
    private readonly client: HypervisorClient,
    private readonly options: DomainHandlersOptions
  ) {
    this.debug = new Debugger('handlers')
    this.parser = new DomainXmlParser()
  }

  /** Descriptors of every domain, in hypervisor order */
  list (): Promise<HandlerResponse<DomainDescriptor[]>> {
    return this.handle('list', async (scope) => {
      const handles = await scope.lookup.enumerate()
      const descriptors: DomainDescriptor[] = []
      for (const handle of handles) {
        descriptors.push(await scope.builder.build(handle))
      }
      return descriptors
    })
  }

  /** Descriptor of one domain */
  get (name: string): Promise<HandlerResponse<DomainDescriptor>> {
    return this.handle(`get ${name}`, async (scope) => {
      const handle = await scope.lookup.resolve(name)
      return scope.builder.build(handle)
    })
  }

  /** Applies a lifecycle action and returns the domain's new descriptor */
  performAction (name: string, action: DomainAction): Promise<HandlerResponse<DomainDescriptor>> {
    return this.handle(`${action} ${name}`, async (scope) => {
      const handle = await scope.lookup.resolve(name)
      return scope.dispatcher.dispatch(handle, action)
    })
  }

  private async handle<T> (
    label: string,
    fn: (scope: RequestScope) => Promise<T>
  ): Promise<HandlerResponse<T>> {
    try {
      const body = await withRequestScope(this.client, this.options.hypervisorUri, label, fn, this.parser)
      return { status: 200, body }
    } catch (error) {
      const response = toErrorResponse(error)
      this.debug.log('error', `${label} failed (${response.status}): ${errorMessage(error)}`)
      return response
    }
  }
}
