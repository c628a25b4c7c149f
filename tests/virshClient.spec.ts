/**
 * VirshClient tests
 *
 * The command runner is replaced with a jest mock; these tests cover the
 * argument lists sent to virsh and the interpretation of its output.
 */

import { VirshClient } from '../src/core/VirshClient'
import { CommandError } from '../src/utils/commandExecutor'
import { DomainHandlers } from '../src/api/DomainHandlers'
import { HypervisorError, HypervisorErrorCode } from '../src/types/hypervisor.types'

const URI = 'qemu:///system'
const WEB_UUID = '0b6c1a2e-3f4d-4e5a-9b7c-8d9e0f1a2b3c'
const ALPHA_UUID = '1c7d2b3f-4a5e-4f6b-8c8d-9e0f1a2b3c4d'
const DB_UUID = '2d8e3c4a-5b6f-4a7c-9d9e-0f1a2b3c4d5e'

function commandError (stderr: string): CommandError {
  return new CommandError(`Command failed with exit code 1\nstderr: ${stderr}`, 'virsh', 1, '', stderr)
}

describe('VirshClient', () => {
  let execute: jest.Mock<Promise<string>, [string, string[]]>
  let client: VirshClient

  beforeEach(() => {
    execute = jest.fn<Promise<string>, [string, string[]]>()
    client = new VirshClient({ executor: { execute } })
  })

  describe('open', () => {
    it('validates the URI with virsh uri', async () => {
      execute.mockResolvedValueOnce('qemu:///system\n')

      const connection = await client.open(URI)

      expect(connection.uri).toBe(URI)
      expect(execute).toHaveBeenCalledWith('virsh', ['-c', URI, 'uri'])
    })

    it('uses the configured binary', async () => {
      client = new VirshClient({ binary: '/usr/local/bin/virsh', executor: { execute } })
      execute.mockResolvedValueOnce(URI)

      await client.open(URI)

      expect(execute).toHaveBeenCalledWith('/usr/local/bin/virsh', ['-c', URI, 'uri'])
    })

    it('reports CONNECTION_FAILED with the tool message', async () => {
      execute.mockRejectedValueOnce(commandError('error: failed to connect to the hypervisor\n'))

      const attempt = client.open(URI)

      await expect(attempt).rejects.toThrow(HypervisorError)
      await expect(attempt).rejects.toMatchObject({
        code: HypervisorErrorCode.CONNECTION_FAILED,
        message: 'error: failed to connect to the hypervisor'
      })
    })
  })

  describe('connection', () => {
    beforeEach(() => {
      execute.mockResolvedValueOnce(URI)
    })

    it('lists domains in virsh order, addressed by UUID', async () => {
      execute.mockResolvedValueOnce(`${WEB_UUID}\n${ALPHA_UUID}\n\n${DB_UUID}\n\n`)
      const connection = await client.open(URI)

      const handles = await connection.listAllDomains()

      expect(handles.map((handle) => handle.ref)).toEqual([WEB_UUID, ALPHA_UUID, DB_UUID])
      expect(execute).toHaveBeenLastCalledWith('virsh', ['-c', URI, 'list', '--all', '--uuid'])
    })

    it('resolves a listed name to its UUID', async () => {
      execute
        .mockResolvedValueOnce(`${WEB_UUID}\n${ALPHA_UUID}\n`)
        .mockResolvedValueOnce('web-01\n')
        .mockResolvedValueOnce('alpha\n')
      const connection = await client.open(URI)

      const handle = await connection.lookupDomainByName('alpha')

      expect(handle.ref).toBe(ALPHA_UUID)
      expect(execute).toHaveBeenNthCalledWith(3, 'virsh', ['-c', URI, 'domname', '--domain', WEB_UUID])
      expect(execute).toHaveBeenNthCalledWith(4, 'virsh', ['-c', URI, 'domname', '--domain', ALPHA_UUID])
    })

    it('signals NO_DOMAIN for a name that is not listed', async () => {
      execute
        .mockResolvedValueOnce(`${WEB_UUID}\n`)
        .mockResolvedValueOnce('web-01\n')
      const connection = await client.open(URI)

      await expect(connection.lookupDomainByName('web')).rejects.toMatchObject({
        code: HypervisorErrorCode.NO_DOMAIN
      })
    })

    it('refuses to run commands after close', async () => {
      const connection = await client.open(URI)
      await connection.close()

      await expect(connection.listAllDomains()).rejects.toMatchObject({
        code: HypervisorErrorCode.CONNECTION_CLOSED
      })
      expect(execute).toHaveBeenCalledTimes(1)
    })
  })

  describe('domain handle', () => {
    async function openHandle (name: string) {
      execute
        .mockResolvedValueOnce(URI)
        .mockResolvedValueOnce(`${WEB_UUID}\n`)
        .mockResolvedValueOnce(`${name}\n`)
      const connection = await client.open(URI)
      const handle = await connection.lookupDomainByName(name)
      return { connection, handle }
    }

    it('fetches markup with dumpxml', async () => {
      const { handle } = await openHandle('web-01')
      execute.mockResolvedValueOnce('<domain/>')

      await expect(handle.getXMLDesc()).resolves.toBe('<domain/>')
      expect(execute).toHaveBeenLastCalledWith('virsh', ['-c', URI, 'dumpxml', '--domain', WEB_UUID])
    })

    it('reads the numeric state from domstats', async () => {
      const { handle } = await openHandle('web-01')
      execute.mockResolvedValueOnce("Domain: 'web-01'\n  state.state=3\n  state.reason=1\n\n")

      await expect(handle.getState()).resolves.toBe(3)
      expect(execute).toHaveBeenLastCalledWith('virsh', ['-c', URI, 'domstats', '--state', WEB_UUID])
    })

    it('reports PROTOCOL_ERROR when domstats has no state line', async () => {
      const { handle } = await openHandle('web-01')
      execute.mockResolvedValueOnce("Domain: 'web-01'\n")

      await expect(handle.getState()).rejects.toMatchObject({
        code: HypervisorErrorCode.PROTOCOL_ERROR
      })
    })

    it.each([
      ['create', 'start'],
      ['destroy', 'destroy'],
      ['reboot', 'reboot'],
      ['resume', 'resume'],
      ['suspend', 'suspend'],
      ['shutdown', 'shutdown']
    ] as const)('%s runs virsh %s', async (method, command) => {
      const { handle } = await openHandle('web-01')
      execute.mockResolvedValueOnce('')

      await handle[method]()

      expect(execute).toHaveBeenLastCalledWith('virsh', ['-c', URI, command, '--domain', WEB_UUID])
    })

    it('passes a refused action through as OPERATION_FAILED with the stderr text', async () => {
      const { handle } = await openHandle('web-01')
      execute.mockRejectedValueOnce(commandError(
        "error: Failed to suspend domain 'web-01'\nerror: Requested operation is not valid: domain is not running\n"
      ))

      await expect(handle.suspend()).rejects.toMatchObject({
        code: HypervisorErrorCode.OPERATION_FAILED,
        ref: WEB_UUID,
        message: "error: Failed to suspend domain 'web-01'\nerror: Requested operation is not valid: domain is not running"
      })
    })

    it('falls back to the executor message when stderr is empty', async () => {
      const { handle } = await openHandle('web-01')
      execute.mockRejectedValueOnce(new Error('spawn virsh ENOENT'))

      await expect(handle.reboot()).rejects.toMatchObject({ message: 'spawn virsh ENOENT' })
    })

    it('refuses use after free and tolerates a second free', async () => {
      const { handle } = await openHandle('web-01')

      await handle.free()
      await handle.free()

      await expect(handle.getXMLDesc()).rejects.toMatchObject({
        code: HypervisorErrorCode.HANDLE_RELEASED
      })
      expect(execute).toHaveBeenCalledTimes(3)
    })

    it('refuses use after its connection closed', async () => {
      const { connection, handle } = await openHandle('web-01')
      await connection.close()

      await expect(handle.getState()).rejects.toMatchObject({
        code: HypervisorErrorCode.CONNECTION_CLOSED
      })
    })
  })

  describe('domains named like IDs or options', () => {
    interface StubDomain { id: number | null, uuid: string, name: string, state: number }

    const domains: StubDomain[] = [
      { id: 1, uuid: WEB_UUID, name: 'web-01', state: 1 },
      { id: null, uuid: ALPHA_UUID, name: '1', state: 5 },
      { id: null, uuid: DB_UUID, name: '--force', state: 5 }
    ]

    // Resolves a domain argument the way virsh does: ID, then UUID, then name
    function resolve (arg: string): StubDomain {
      const found = domains.find((domain) => String(domain.id) === arg) ??
        domains.find((domain) => domain.uuid === arg) ??
        domains.find((domain) => domain.name === arg)
      if (found === undefined) {
        throw commandError(`error: failed to get domain '${arg}'\n`)
      }
      return found
    }

    function domainArgument (args: string[]): string {
      const option = args.indexOf('--domain')
      return option >= 0 ? args[option + 1] : args[args.length - 1]
    }

    beforeEach(() => {
      execute.mockImplementation(async (_binary, argv) => {
        const [, , command, ...args] = argv
        switch (command) {
          case 'uri':
            return `${URI}\n`
          case 'list':
            return domains.map((domain) => `${domain.uuid}\n`).join('')
          case 'domname':
            return `${resolve(domainArgument(args)).name}\n`
          case 'dumpxml': {
            const domain = resolve(domainArgument(args))
            return `<domain type="kvm"><name>${domain.name}</name><uuid>${domain.uuid}</uuid></domain>`
          }
          case 'domstats':
            return `Domain: 'x'\n  state.state=${resolve(domainArgument(args)).state}\n`
          default:
            return ''
        }
      })
    })

    it('reaches the domain named 1 rather than the domain with ID 1', async () => {
      const handlers = new DomainHandlers(client, { hypervisorUri: URI })

      const response = await handlers.get('1')

      expect(response.status).toBe(200)
      expect(response.body).toMatchObject({ name: '1', uuid: ALPHA_UUID, state: 'shutoff' })
    })

    it('never passes the requested name to virsh', async () => {
      const handlers = new DomainHandlers(client, { hypervisorUri: URI })

      await handlers.performAction('--force', 'destroy')

      const sentArguments = execute.mock.calls.flatMap(([, argv]) => argv)
      expect(sentArguments).not.toContain('--force')
      expect(execute).toHaveBeenCalledWith('virsh', ['-c', URI, 'destroy', '--domain', DB_UUID])
    })
  })
})
