/**
 * Single-consumer dispatch queue.
 *
 * Jobs run one at a time in submission order. After a job completes, the
 * next one starts no sooner than `intervalSeconds` later, so each request
 * category (embedding, rerank) holds a steady request rate against its
 * service regardless of how many callers are waiting.
 */

import { KnowledgeError } from '../common/index.js'

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>

export interface DispatchQueueOptions {
  /** Category name used in log lines, e.g. `embedding`. */
  name: string
  intervalSeconds: number
  now?: () => number
  sleep?: Sleep
}

interface QueuedJob {
  execute(): Promise<void>
  cancel(error: KnowledgeError): void
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const done = (): void => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}

export class DispatchQueue {
  readonly name: string
  private readonly intervalMs: number
  private readonly now: () => number
  private readonly sleep: Sleep
  private readonly controller = new AbortController()
  private pending: QueuedJob[] = []
  private worker: Promise<void> | null = null
  private lastCompletedAt: number | null = null
  private inFlight = false
  private stopped = false

  constructor(options: DispatchQueueOptions) {
    this.name = options.name
    this.intervalMs = Math.max(0, options.intervalSeconds) * 1000
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? abortableSleep
  }

  /** Jobs waiting to start. */
  get size(): number {
    return this.pending.length
  }

  get isBusy(): boolean {
    return this.inFlight
  }

  get isStopped(): boolean {
    return this.stopped
  }

  /** Enqueue `job`; the returned promise settles with the job's own outcome. */
  submit<T>(job: () => Promise<T>): Promise<T> {
    if (this.stopped) {
      return Promise.reject(KnowledgeError.cancelled(`Dispatch queue "${this.name}" is stopped`))
    }

    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        execute: async () => {
          try {
            const value = await job()
            this.markSettled()
            resolve(value)
          } catch (err) {
            this.markSettled()
            reject(err)
          }
        },
        cancel: reject,
      })
      this.ensureWorker()
    })
  }

  /**
   * Reject every waiting job, wait for the in-flight one to settle, and
   * refuse later submissions.
   */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true
      this.controller.abort()
      const cancelled = this.pending
      this.pending = []
      if (cancelled.length > 0) {
        console.warn(`[dispatch:${this.name}] stopping, cancelled ${cancelled.length} pending job(s)`)
      }
      for (const job of cancelled) {
        job.cancel(KnowledgeError.cancelled(`Dispatch queue "${this.name}" stopped before the job ran`))
      }
    }
    if (this.worker) await this.worker
  }

  private ensureWorker(): void {
    if (this.worker || this.stopped) return
    this.worker = this.drain().finally(() => {
      this.worker = null
      // A job submitted while the worker was winding down still needs one.
      if (this.pending.length > 0) this.ensureWorker()
    })
  }

  private async drain(): Promise<void> {
    while (!this.stopped && this.pending.length > 0) {
      if (this.lastCompletedAt !== null) {
        const wait = this.intervalMs - (this.now() - this.lastCompletedAt)
        if (wait > 0) await this.sleep(wait, this.controller.signal)
      }

      const job = this.pending.shift()
      if (this.stopped || !job) break

      this.inFlight = true
      await job.execute()
    }
  }

  // Called before the job's own promise settles.
  private markSettled(): void {
    this.inFlight = false
    this.lastCompletedAt = this.now()
  }
}
