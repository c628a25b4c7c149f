/**
 * Debugger namespace routing
 */

import debug from 'debug'
import { DEBUG_NAMESPACE, Debugger } from '../src/utils/debug'

describe('Debugger', () => {
  let previous: string
  let written: Array<{ namespace: string, line: string }>
  let write: jest.SpyInstance

  beforeEach(() => {
    previous = debug.disable()
    debug.enable(`${DEBUG_NAMESPACE}:*`)
    written = []
    write = jest.spyOn(debug, 'log').mockImplementation(function (this: debug.Debugger, line: string) {
      written.push({ namespace: this.namespace, line })
    })
  })

  afterEach(() => {
    write.mockRestore()
    debug.disable()
    debug.enable(previous)
  })

  it('writes plain messages under the module namespace', () => {
    new Debugger('virsh').log('Connected to qemu:///system')

    expect(written).toHaveLength(1)
    expect(written[0].namespace).toBe('domgate:virsh')
    expect(written[0].line).toContain('Connected to qemu:///system')
  })

  it('writes channel messages under a sub-namespace and reuses it', () => {
    const logger = new Debugger('resource-tracker')

    logger.log('error', 'first')
    logger.log('error', 'second')

    expect(written.map((entry) => entry.namespace)).toEqual([
      'domgate:resource-tracker:error',
      'domgate:resource-tracker:error'
    ])
  })

  it('stays quiet when its namespace is not enabled', () => {
    debug.disable()

    new Debugger('http').log('GET /ping -> 200')

    expect(written).toEqual([])
  })
})
