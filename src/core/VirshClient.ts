import { CommandExecutor, CommandError, CommandRunner } from '../utils/commandExecutor'
import { Debugger } from '../utils/debug'
import {
  DomainHandle,
  HypervisorClient,
  HypervisorConnection,
  HypervisorError,
  HypervisorErrorCode
} from '../types/hypervisor.types'

/** Default management tool */
export const DEFAULT_VIRSH_BINARY = 'virsh'

/** Matches the run-state line of `virsh domstats --state` */
const STATE_LINE = /^\s*state\.state=(-?\d+)\s*$/m

/**
 * Options for VirshClient
 */
export interface VirshClientOptions {
  /** virsh binary name or path (default: 'virsh') */
  binary?: string
  /** Command runner (default: a new CommandExecutor) */
  executor?: CommandRunner
}

/**
 * Message to surface for a failed command: the tool's own stderr when there
 * is any, otherwise the executor's summary.
 */
function commandFailureMessage (error: unknown): string {
  if (error instanceof CommandError && error.stderr.trim() !== '') {
    return error.stderr.trim()
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * Runs virsh against one URI. Shared by a connection and its handles.
 */
class VirshSession {
  private closed: boolean = false

  constructor (
    readonly uri: string,
    private readonly binary: string,
    private readonly executor: CommandRunner,
    readonly debug: Debugger
  ) {}

  markClosed (): void {
    this.closed = true
  }

  async run (args: string[], ref?: string): Promise<string> {
    if (this.closed) {
      throw new HypervisorError(HypervisorErrorCode.CONNECTION_CLOSED, `Connection to ${this.uri} is closed`, ref)
    }

    try {
      return await this.executor.execute(this.binary, ['-c', this.uri, ...args])
    } catch (error) {
      throw new HypervisorError(HypervisorErrorCode.OPERATION_FAILED, commandFailureMessage(error), ref)
    }
  }

  async listUuids (): Promise<string[]> {
    return lines(await this.run(['list', '--all', '--uuid']))
  }

  async nameOf (uuid: string): Promise<string> {
    return (await this.run(['domname', '--domain', uuid], uuid)).trim()
  }
}

function lines (output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
}

/**
 * DomainHandle backed by virsh. The domain is addressed by UUID: virsh reads
 * a bare domain argument as an ID first and a name last, so a name such as
 * `1` could select another domain.
 */
class VirshDomainHandle implements DomainHandle {
  private released: boolean = false

  constructor (readonly ref: string, private readonly session: VirshSession) {}

  getXMLDesc (): Promise<string> {
    return this.run(['dumpxml', '--domain', this.ref])
  }

  async getState (): Promise<number> {
    // domstats only takes domains positionally
    const output = await this.run(['domstats', '--state', this.ref])
    const match = STATE_LINE.exec(output)
    if (!match) {
      throw new HypervisorError(
        HypervisorErrorCode.PROTOCOL_ERROR,
        `No state.state field in domstats output for ${this.ref}`,
        this.ref
      )
    }
    return Number(match[1])
  }

  async create (): Promise<void> {
    await this.run(['start', '--domain', this.ref])
  }

  async destroy (): Promise<void> {
    await this.run(['destroy', '--domain', this.ref])
  }

  async reboot (): Promise<void> {
    await this.run(['reboot', '--domain', this.ref])
  }

  async resume (): Promise<void> {
    await this.run(['resume', '--domain', this.ref])
  }

  async suspend (): Promise<void> {
    await this.run(['suspend', '--domain', this.ref])
  }

  async shutdown (): Promise<void> {
    await this.run(['shutdown', '--domain', this.ref])
  }

  async free (): Promise<void> {
    if (this.released) {
      return
    }
    this.released = true
    this.session.debug.log(`Freeing: ${this.ref}`)
  }

  private async run (args: string[]): Promise<string> {
    if (this.released) {
      throw new HypervisorError(HypervisorErrorCode.HANDLE_RELEASED, `Handle for ${this.ref} has been released`, this.ref)
    }
    return this.session.run(args, this.ref)
  }
}

/**
 * HypervisorConnection backed by virsh
 */
class VirshConnection implements HypervisorConnection {
  constructor (private readonly session: VirshSession) {}

  get uri (): string {
    return this.session.uri
  }

  async listAllDomains (): Promise<DomainHandle[]> {
    const uuids = await this.session.listUuids()
    return uuids.map((uuid) => new VirshDomainHandle(uuid, this.session))
  }

  /**
   * Matches the name against each listed domain's own name, one UUID at a
   * time, and never hands the name itself to virsh.
   */
  async lookupDomainByName (name: string): Promise<DomainHandle> {
    const uuids = await this.session.listUuids()
    for (const uuid of uuids) {
      if (await this.session.nameOf(uuid) === name) {
        return new VirshDomainHandle(uuid, this.session)
      }
    }
    throw new HypervisorError(HypervisorErrorCode.NO_DOMAIN, `Domain not found: no domain with matching name '${name}'`, name)
  }

  async close (): Promise<void> {
    this.session.markClosed()
  }
}

/**
 * VirshClient drives a libvirt daemon through the `virsh` command-line tool.
 * Commands are spawned without a shell.
 *
 * Each call is a separate virsh invocation against the connection URI, so a
 * "session" here is the validated URI plus the open/closed bookkeeping that
 * keeps handles from being used after their connection or themselves have
 * been released.
 *
 * Handles carry the domain UUID. Not-found is decided by comparing the
 * listed domains' names rather than by reading virsh's error text.
 *
 * @example
 * ```typescript
 * const client = new VirshClient()
 * const connection = await client.open('qemu:///system')
 * const handle = await connection.lookupDomainByName('vm1')
 * console.log(handle.ref)  // the domain UUID
 * console.log(await handle.getState())  // 1
 * await handle.free()
 * await connection.close()
 * ```
 */
export class VirshClient implements HypervisorClient {
  private readonly binary: string
  private readonly executor: CommandRunner
  private readonly debug: Debugger

  constructor (options: VirshClientOptions = {}) {
    this.binary = options.binary ?? DEFAULT_VIRSH_BINARY
    this.executor = options.executor ?? new CommandExecutor()
    this.debug = new Debugger('virsh')
  }

  /**
   * Validates the URI by asking virsh for the canonical connection URI.
   * @throws HypervisorError (CONNECTION_FAILED)
   */
  async open (uri: string): Promise<HypervisorConnection> {
    try {
      const canonical = await this.executor.execute(this.binary, ['-c', uri, 'uri'])
      this.debug.log(`Connected to ${canonical.trim() || uri}`)
    } catch (error) {
      throw new HypervisorError(HypervisorErrorCode.CONNECTION_FAILED, commandFailureMessage(error))
    }

    return new VirshConnection(new VirshSession(uri, this.binary, this.executor, this.debug))
  }
}
