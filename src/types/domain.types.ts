/**
 * Domain Descriptor Type Definitions
 *
 * Point-in-time snapshot of a domain as served over HTTP, the closed
 * run-state enumeration, and the closed lifecycle action set. Property names
 * follow the JSON wire shape, including the historical `vpcu` key.
 */

import { StateMappingError } from './errors.types'

// =============================================================================
// Devices
// =============================================================================

export interface DiskDriver {
  readonly name: string
  readonly type: string
}

export interface DiskSource {
  readonly file?: string
  readonly device?: string
}

export interface DiskTarget {
  readonly dev: string
  readonly bus: string
}

export interface DomainDisk {
  readonly type: string
  readonly device: string
  readonly driver: DiskDriver
  readonly source: DiskSource
  readonly target: DiskTarget
}

export interface InterfaceSource {
  readonly network?: string
  readonly bridge?: string
}

export interface InterfaceMac {
  readonly address: string
}

export interface InterfaceModel {
  readonly type?: string
}

export interface FilterRefParameter {
  readonly name: string
  readonly value: string
}

/**
 * Network filter reference. `filter` is '' when the interface has none.
 */
export interface FilterRef {
  readonly filter: string
  readonly parameters: readonly FilterRefParameter[]
}

export interface DomainInterface {
  readonly type: string
  readonly source: InterfaceSource
  readonly mac: InterfaceMac
  readonly model: InterfaceModel
  readonly filterref: FilterRef
}

export interface DomainDevices {
  readonly disks: readonly DomainDisk[]
  readonly interfaces: readonly DomainInterface[]
}

// =============================================================================
// Boot
// =============================================================================

export interface OsType {
  /** Guest OS type, e.g. 'hvm' */
  readonly type: string
  readonly arch?: string
  readonly machine?: string
}

export interface OsBoot {
  readonly dev?: string
}

export interface DomainOs {
  readonly type: OsType
  readonly boot: OsBoot
}

// =============================================================================
// Run State
// =============================================================================

/**
 * Lifecycle state labels, indexed by the hypervisor's run-state code
 */
export const DOMAIN_STATES = Object.freeze([
  'nostate',
  'running',
  'blocked',
  'paused',
  'shutdown',
  'shutoff',
  'crashed',
  'suspended'
] as const)

export type DomainState = typeof DOMAIN_STATES[number]

/**
 * Code to label lookup. Built once at load time and frozen.
 */
const STATE_BY_CODE: ReadonlyMap<number, DomainState> = new Map(
  DOMAIN_STATES.map((state, code) => [code, state] as const)
)
Object.freeze(STATE_BY_CODE)

/**
 * Maps a raw run-state code to its label.
 *
 * @param code - Run-state code reported by the hypervisor
 * @param domain - Domain name, for error context
 * @throws StateMappingError when the code has no label
 *
 * @example
 * ```typescript
 * mapDomainState(1)   // 'running'
 * mapDomainState(5)   // 'shutoff'
 * mapDomainState(42)  // throws StateMappingError
 * ```
 */
export function mapDomainState (code: number, domain?: string): DomainState {
  const state = STATE_BY_CODE.get(code)
  if (state === undefined) {
    throw new StateMappingError(code, domain)
  }
  return state
}

// =============================================================================
// Descriptor
// =============================================================================

/**
 * Fields read from descriptor markup
 */
export interface DomainDefinition {
  readonly type: string
  readonly uuid: string
  readonly name: string
  /** Memory as written in the markup (KiB unless the markup says otherwise) */
  readonly memory: number
  readonly vpcu: number
  readonly devices: DomainDevices
  readonly os: DomainOs
}

/**
 * Immutable snapshot of a domain at the instant it was fetched
 */
export interface DomainDescriptor extends DomainDefinition {
  readonly state: DomainState
}

// =============================================================================
// Actions
// =============================================================================

/**
 * Closed lifecycle action vocabulary
 */
export const DOMAIN_ACTIONS = Object.freeze([
  'create',
  'destroy',
  'reboot',
  'resume',
  'suspend',
  'shutdown'
] as const)

export type DomainAction = typeof DOMAIN_ACTIONS[number]

/**
 * Type guard to check if a string is a DomainAction
 */
export function isDomainAction (value: string): value is DomainAction {
  return DOMAIN_ACTIONS.some((action) => action === value)
}
