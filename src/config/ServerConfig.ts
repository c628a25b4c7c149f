/**
 * Server configuration, read from the environment at startup.
 */

import { DEFAULT_VIRSH_BINARY } from '../core/VirshClient'

/** Hypervisor endpoint used when none is configured */
export const DEFAULT_HYPERVISOR_URI = 'qemu:///system'

/** Listen address */
export const DEFAULT_HOST = '0.0.0.0'

/** Listen port */
export const DEFAULT_PORT = 8080

/**
 * Runtime configuration for the HTTP service
 */
export interface ServerConfig {
  /** Management endpoint every request opens a session against */
  hypervisorUri: string
  /** Address to listen on */
  host: string
  /** Port to listen on */
  port: number
  /** virsh binary name or path */
  virshBinary: string
}

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  readonly variable: string

  constructor (variable: string, message: string) {
    super(message)
    this.name = 'ConfigError'
    this.variable = variable
  }
}

/**
 * Builds a ServerConfig from environment variables:
 *
 * - DOMGATE_HYPERVISOR_URI (default: qemu:///system)
 * - DOMGATE_HOST (default: 0.0.0.0)
 * - DOMGATE_PORT (default: 8080)
 * - DOMGATE_VIRSH_BINARY (default: virsh)
 *
 * Empty values count as unset.
 *
 * @throws ConfigError when DOMGATE_PORT is not an integer in 1..65535
 */
export function loadServerConfig (env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const value = (name: string): string | undefined => {
    const raw = env[name]?.trim()
    return raw === undefined || raw === '' ? undefined : raw
  }

  return {
    hypervisorUri: value('DOMGATE_HYPERVISOR_URI') ?? DEFAULT_HYPERVISOR_URI,
    host: value('DOMGATE_HOST') ?? DEFAULT_HOST,
    port: parsePort(value('DOMGATE_PORT')),
    virshBinary: value('DOMGATE_VIRSH_BINARY') ?? DEFAULT_VIRSH_BINARY
  }
}

function parsePort (raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_PORT
  }
  const port = Number(raw)
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    throw new ConfigError('DOMGATE_PORT', `DOMGATE_PORT must be an integer between 1 and 65535, got '${raw}'`)
  }
  return port
}
