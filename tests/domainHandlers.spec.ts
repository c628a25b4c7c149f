/**
 * DomainHandlers tests
 *
 * Exercises list/get/performAction against the in-memory hypervisor and
 * checks that every request releases exactly the handles it acquired.
 */

import { DomainHandlers, INTERNAL_ERROR_CODE, toErrorResponse } from '../src/api/DomainHandlers'
import { ResourceTrackerError } from '../src/core/ResourceTracker'
import { ActionError, ConnectionError, DomainErrorCode, NotFoundError, StateMappingError } from '../src/types/errors.types'
import { FakeHypervisor, StateCode, standardHypervisor } from './support/FakeHypervisor'

describe('DomainHandlers', () => {
  let hypervisor: FakeHypervisor
  let handlers: DomainHandlers

  beforeEach(() => {
    hypervisor = standardHypervisor()
    handlers = new DomainHandlers(hypervisor, { hypervisorUri: 'test:///default' })
  })

  afterEach(() => {
    expect(hypervisor.leakedHandles()).toEqual([])
    expect(hypervisor.doubleFreedHandles()).toEqual([])
    for (const connection of hypervisor.connections) {
      expect(connection.closeCount).toBe(1)
    }
  })

  describe('list', () => {
    it('returns one descriptor per domain in hypervisor order', async () => {
      const response = await handlers.list()

      expect(response.status).toBe(200)
      if (response.status !== 200) return
      expect(response.body.map((descriptor) => descriptor.name)).toEqual(['vm1', 'vm2'])
      expect(response.body.map((descriptor) => descriptor.state)).toEqual(['running', 'shutoff'])
      expect(new Set(response.body.map((descriptor) => descriptor.uuid)).size).toBe(2)
    })

    it('returns an error body instead of a partial list', async () => {
      hypervisor.domains[1].state = 99

      const response = await handlers.list()

      expect(response).toEqual({
        status: 500,
        body: { error: 'Unknown domain state code: 99', code: DomainErrorCode.STATE_MAPPING_FAILED }
      })
    })

    it('releases handles that were never built when an earlier build fails', async () => {
      hypervisor.domains.push({ name: 'vm3', uuid: 'u-3', state: StateCode.RUNNING })
      hypervisor.failures.set('getXMLDesc:vm1', new Error('markup unavailable'))

      const response = await handlers.list()

      expect(response.status).toBe(500)
      expect(hypervisor.handles).toHaveLength(3)
    })
  })

  describe('get', () => {
    it('returns the descriptor of the named domain', async () => {
      const response = await handlers.get('vm2')

      expect(response.status).toBe(200)
      expect(response.body).toMatchObject({ name: 'vm2', state: 'shutoff' })
    })

    it('answers 404 for an unknown domain', async () => {
      const response = await handlers.get('does-not-exist')

      expect(response).toEqual({
        status: 404,
        body: {
          error: "Domain not found: no domain with matching name 'does-not-exist'",
          code: DomainErrorCode.DOMAIN_NOT_FOUND
        }
      })
    })

    it('answers 500 when the session cannot be opened', async () => {
      hypervisor.openFailure = new Error('Connection refused')

      const response = await handlers.get('vm1')

      expect(response).toEqual({
        status: 500,
        body: {
          error: 'Failed to connect to hypervisor at test:///default: Connection refused',
          code: DomainErrorCode.CONNECTION_FAILED
        }
      })
      expect(hypervisor.handles).toHaveLength(0)
    })
  })

  describe('performAction', () => {
    it('returns the post-action descriptor', async () => {
      const response = await handlers.performAction('vm1', 'suspend')

      expect(response.status).toBe(200)
      expect(response.body).toMatchObject({ name: 'vm1', state: 'paused' })
    })

    it('reports a repeated suspend as a server error with the hypervisor message', async () => {
      await handlers.performAction('vm1', 'suspend')

      const response = await handlers.performAction('vm1', 'suspend')

      expect(response).toEqual({
        status: 500,
        body: {
          error: 'Requested operation is not valid: domain is already paused',
          code: DomainErrorCode.ACTION_FAILED
        }
      })
    })

    it('answers 404 for an unknown domain', async () => {
      const response = await handlers.performAction('ghost', 'create')

      expect(response.status).toBe(404)
    })

    it('walks a domain through its lifecycle', async () => {
      const states: string[] = []
      for (const action of ['create', 'suspend', 'resume', 'reboot', 'shutdown'] as const) {
        const response = await handlers.performAction('vm2', action)
        if (response.status === 200) {
          states.push(response.body.state)
        }
      }

      expect(states).toEqual(['running', 'paused', 'running', 'running', 'shutoff'])
    })
  })
})

describe('toErrorResponse', () => {
  it.each([
    [new NotFoundError('vm9'), 404, 'Domain not found: vm9', DomainErrorCode.DOMAIN_NOT_FOUND],
    [new ConnectionError('refused'), 500, 'refused', DomainErrorCode.CONNECTION_FAILED],
    [new StateMappingError(11), 500, 'Unknown domain state code: 11', DomainErrorCode.STATE_MAPPING_FAILED],
    [new ActionError('reboot', 'guest agent missing'), 500, 'guest agent missing', DomainErrorCode.ACTION_FAILED]
  ])('maps %p', (error, status, message, code) => {
    expect(toErrorResponse(error)).toEqual({ status, body: { error: message, code } })
  })

  it('hides the details of unexpected errors', () => {
    const response = toErrorResponse(new ResourceTrackerError('register after drain'))

    expect(response).toEqual({
      status: 500,
      body: { error: 'Internal server error', code: INTERNAL_ERROR_CODE }
    })
  })
})
