/**
 * Domain Error Types
 *
 * Every failure the request core can produce is a DomainError carrying a
 * stable DomainErrorCode. The HTTP boundary branches on the class (not the
 * message) to pick a status.
 */

/**
 * Stable error identifiers, returned to clients in the `code` field
 */
export enum DomainErrorCode {
  /** Management session could not be opened */
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  /** No domain with the requested name */
  DOMAIN_NOT_FOUND = 'DOMAIN_NOT_FOUND',
  /** Lookup by name failed for a reason other than not-found */
  LOOKUP_FAILED = 'LOOKUP_FAILED',
  /** Listing domains failed */
  ENUMERATION_FAILED = 'ENUMERATION_FAILED',
  /** Descriptor markup could not be fetched */
  DESCRIPTOR_FETCH_FAILED = 'DESCRIPTOR_FETCH_FAILED',
  /** Descriptor markup could not be parsed */
  DESCRIPTOR_PARSE_FAILED = 'DESCRIPTOR_PARSE_FAILED',
  /** Run-state could not be queried */
  STATE_QUERY_FAILED = 'STATE_QUERY_FAILED',
  /** Run-state code is outside the known enumeration */
  STATE_MAPPING_FAILED = 'STATE_MAPPING_FAILED',
  /** Hypervisor rejected a lifecycle transition */
  ACTION_FAILED = 'ACTION_FAILED'
}

/**
 * Base class for request-level domain errors
 */
export class DomainError extends Error {
  /** Error code for programmatic handling */
  public readonly code: DomainErrorCode

  /** Domain the error concerns (if applicable) */
  public readonly domain?: string

  /** Additional context for debugging */
  public readonly context?: Record<string, unknown>

  constructor (
    code: DomainErrorCode,
    message: string,
    domain?: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'DomainError'
    this.code = code
    this.domain = domain
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/** The management session could not be opened */
export class ConnectionError extends DomainError {
  constructor (message: string, context?: Record<string, unknown>) {
    super(DomainErrorCode.CONNECTION_FAILED, message, undefined, context)
    this.name = 'ConnectionError'
  }
}

/** The requested domain does not exist */
export class NotFoundError extends DomainError {
  constructor (domain: string, message?: string) {
    super(DomainErrorCode.DOMAIN_NOT_FOUND, message ?? `Domain not found: ${domain}`, domain)
    this.name = 'NotFoundError'
  }
}

/** Descriptor markup or run-state could not be obtained or parsed */
export class DescriptorError extends DomainError {
  constructor (
    code: DomainErrorCode.DESCRIPTOR_FETCH_FAILED | DomainErrorCode.DESCRIPTOR_PARSE_FAILED | DomainErrorCode.STATE_QUERY_FAILED,
    message: string,
    domain?: string
  ) {
    super(code, message, domain)
    this.name = 'DescriptorError'
  }
}

/** A run-state code has no label */
export class StateMappingError extends DomainError {
  /** The offending code */
  public readonly stateCode: number

  constructor (stateCode: number, domain?: string) {
    super(
      DomainErrorCode.STATE_MAPPING_FAILED,
      `Unknown domain state code: ${stateCode}`,
      domain,
      { stateCode }
    )
    this.name = 'StateMappingError'
    this.stateCode = stateCode
  }
}

/** The hypervisor rejected a lifecycle transition */
export class ActionError extends DomainError {
  public readonly action: string

  constructor (action: string, message: string, domain?: string) {
    super(DomainErrorCode.ACTION_FAILED, message, domain, { action })
    this.name = 'ActionError'
    this.action = action
  }
}

/**
 * Type guard to check if an error is a DomainError
 */
export function isDomainError (error: unknown): error is DomainError {
  return error instanceof DomainError
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage (error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
