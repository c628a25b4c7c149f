import debug from 'debug'

/** Root namespace shared by every logger in the service */
export const DEBUG_NAMESPACE = 'domgate'

/**
 * Per-module logger under `domgate:<module>`. `log(channel, message)` writes
 * to `domgate:<module>:<channel>` instead; virsh failures go to
 * `domgate:virsh:error`. Run with `DEBUG=domgate:*` to see everything.
 */
export class Debugger {
  private debuggers: { [key: string]: debug.Debugger } = {}

  constructor (private module: string) {
    this.debuggers.default = debug(`${DEBUG_NAMESPACE}:${module}`)
  }

  public log (...args: string[]) {
    if (args.length === 1) {
      this.debuggers.default(args[0])
    } else if (args.length === 2) {
      const [subDebug, message] = args
      if (!this.debuggers[subDebug]) {
        this.debuggers[subDebug] = debug(`${DEBUG_NAMESPACE}:${this.module}:${subDebug}`)
      }
      this.debuggers[subDebug](message)
    }
  }
}
