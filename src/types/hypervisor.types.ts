/**
 * Hypervisor Client Contract
 *
 * The management channel the service talks to. The request-scoped core
 * (ConnectionScope, DomainLookup, DescriptorBuilder, ActionDispatcher) only
 * depends on these interfaces; VirshClient is the production implementation
 * and the test suite ships an in-memory one.
 */

// =============================================================================
// Handles and Connections
// =============================================================================

/**
 * Reference to a hypervisor-side domain object.
 *
 * A handle is owned by whoever acquired it until `free()` is called and must
 * not be used afterwards. Handles never outlive the connection that produced
 * them.
 */
export interface DomainHandle {
  /** Identifier the hypervisor knows the domain by */
  readonly ref: string

  /** Fetch the domain's descriptor markup */
  getXMLDesc (): Promise<string>

  /** Fetch the raw run-state code */
  getState (): Promise<number>

  /** Boot a defined, inactive domain */
  create (): Promise<void>

  /** Forcefully stop the domain */
  destroy (): Promise<void>

  /** Ask the guest to reboot */
  reboot (): Promise<void>

  /** Resume a paused domain */
  resume (): Promise<void>

  /** Pause a running domain */
  suspend (): Promise<void>

  /** Ask the guest to shut down gracefully */
  shutdown (): Promise<void>

  /** Release the handle */
  free (): Promise<void>
}

/**
 * One open management session.
 */
export interface HypervisorConnection {
  /** URI the session was opened against */
  readonly uri: string

  /** All domains visible on the connection, in the order the hypervisor reports them */
  listAllDomains (): Promise<DomainHandle[]>

  /**
   * Resolve a domain by name.
   * @throws HypervisorError with code NO_DOMAIN when no such domain exists
   */
  lookupDomainByName (name: string): Promise<DomainHandle>

  /** Close the session */
  close (): Promise<void>
}

/**
 * Factory for management sessions.
 */
export interface HypervisorClient {
  /**
   * Open a session against `uri`.
   * @throws HypervisorError with code CONNECTION_FAILED when the endpoint is
   *         unreachable or refuses the session
   */
  open (uri: string): Promise<HypervisorConnection>
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes a hypervisor client reports
 */
export enum HypervisorErrorCode {
  /** No domain matches the requested name */
  NO_DOMAIN = 'NO_DOMAIN',
  /** Session could not be opened */
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  /** Session was used after close() */
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  /** Handle was used after free() */
  HANDLE_RELEASED = 'HANDLE_RELEASED',
  /** The hypervisor rejected or failed an operation */
  OPERATION_FAILED = 'OPERATION_FAILED',
  /** The hypervisor answered with something the client cannot interpret */
  PROTOCOL_ERROR = 'PROTOCOL_ERROR'
}

/**
 * Error raised by hypervisor clients. `code` is the structural signal callers
 * branch on; `message` is the hypervisor's own text.
 */
export class HypervisorError extends Error {
  readonly code: HypervisorErrorCode
  /** Domain the call was about, when there was one */
  readonly ref?: string

  constructor (code: HypervisorErrorCode, message: string, ref?: string) {
    super(message)
    this.name = 'HypervisorError'
    this.code = code
    this.ref = ref

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HypervisorError)
    }
  }
}

/**
 * Type guard to check if an error is a HypervisorError
 */
export function isHypervisorError (error: unknown): error is HypervisorError {
  return error instanceof HypervisorError
}
