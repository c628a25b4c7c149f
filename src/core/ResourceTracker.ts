import { Debugger } from '../utils/debug'
import { errorMessage } from '../types/errors.types'

/**
 * Anything the tracker can release. DomainHandle satisfies it.
 */
export interface Releasable {
  readonly ref: string
  free (): Promise<void>
}

/**
 * Outcome of a drain
 */
export interface DrainSummary {
  /** Handles released successfully */
  released: number
  /** Handles whose release threw; they are not retried */
  failed: number
}

/**
 * Thrown when the tracker is used after it has drained. This is a bug in
 * the calling code, not a client-facing condition.
 */
export class ResourceTrackerError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'ResourceTrackerError'
  }
}

interface TrackedEntry {
  readonly resource: Releasable
  released: boolean
}

/**
 * ResourceTracker owns every native handle acquired while serving one
 * request and releases each of them exactly once.
 *
 * Handles are released in registration order when `drain()` runs at request
 * end. A handler that is done with a handle earlier can `release()` it; the
 * drain then skips it. An entry is marked released before `free()` is
 * called, so no path can free the same handle twice even if the client does
 * not guard against it.
 *
 * @example
 * ```typescript
 * const tracker = new ResourceTracker('GET /domains')
 * try {
 *   for (const handle of await connection.listAllDomains()) {
 *     tracker.register(handle)
 *   }
 *   // ... build the response
 * } finally {
 *   await tracker.drain()
 * }
 * ```
 */
export class ResourceTracker {
  private readonly debug: Debugger
  private readonly entries: TrackedEntry[] = []
  private readonly index: Map<Releasable, TrackedEntry> = new Map()
  private isDrained: boolean = false
  private releaseCount: number = 0

  /**
   * @param label - Identifies the owning request in log output
   */
  constructor (private readonly label: string = 'request') {
    this.debug = new Debugger('resource-tracker')
  }

  /** Number of distinct handles registered so far */
  get registeredCount (): number {
    return this.entries.length
  }

  /** Number of handles whose release has been attempted */
  get releasedCount (): number {
    return this.releaseCount
  }

  /** Whether drain() has run */
  get drained (): boolean {
    return this.isDrained
  }

  /**
   * Takes ownership of a handle.
   *
   * @returns true if the handle was newly tracked, false if it already was
   * @throws ResourceTrackerError if the tracker has already drained; the
   *         handle is released before throwing
   */
  async register (resource: Releasable): Promise<boolean> {
    if (this.isDrained) {
      this.debug.log('error', `[${this.label}] register(${resource.ref}) after drain`)
      await this.free(resource)
      throw new ResourceTrackerError(
        `Cannot register ${resource.ref}: tracker for ${this.label} has already drained`
      )
    }

    if (this.index.has(resource)) {
      return false
    }

    const entry: TrackedEntry = { resource, released: false }
    this.entries.push(entry)
    this.index.set(resource, entry)
    return true
  }

  /**
   * Releases one tracked handle ahead of the drain. Unknown or already
   * released handles are ignored.
   *
   * @returns true if this call released the handle successfully
   */
  async release (resource: Releasable): Promise<boolean> {
    const entry = this.index.get(resource)
    if (!entry || entry.released) {
      return false
    }
    return this.releaseEntry(entry)
  }

  /**
   * Releases every tracked handle that is still held, in registration order.
   * Individual failures are logged and do not stop the remaining releases.
   * Runs once; later calls are no-ops.
   */
  async drain (): Promise<DrainSummary> {
    const summary: DrainSummary = { released: 0, failed: 0 }

    if (this.isDrained) {
      this.debug.log('error', `[${this.label}] drain() called more than once`)
      return summary
    }
    this.isDrained = true

    for (const entry of this.entries) {
      if (entry.released) {
        continue
      }
      if (await this.releaseEntry(entry)) {
        summary.released++
      } else {
        summary.failed++
      }
    }

    this.debug.log(
      `[${this.label}] drained ${this.entries.length} handle(s): ${summary.released} released now, ${summary.failed} failed`
    )
    return summary
  }

  private async releaseEntry (entry: TrackedEntry): Promise<boolean> {
    entry.released = true
    this.releaseCount++
    return this.free(entry.resource)
  }

  private async free (resource: Releasable): Promise<boolean> {
    try {
      await resource.free()
      return true
    } catch (error) {
      this.debug.log('error', `[${this.label}] failed to release ${resource.ref}: ${errorMessage(error)}`)
      return false
    }
  }
}
