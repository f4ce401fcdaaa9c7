/**
 * @file Task Cleanup
 *
 * Completed tasks accumulate in the engine's internal task-tracking index.
 * Cleanup deletes the completed ones older than a given age, itself as an
 * async task.
 */

import type { RetryFunction } from '../types/index.js'
import type { AsyncTaskWaiter } from './task-waiter.js'

/** Internal index where the engine records tasks */
export const TASKS_INDEX = '.tasks'

export interface TaskCleanupOptions {
  withRetries: RetryFunction
  waiter: AsyncTaskWaiter
  /** Clock in ms since epoch. Defaults to `Date.now`. */
  now?: () => number
}

/**
 * Query selecting completed tasks started more than `deletableTaskAge`
 * seconds before `nowMs`.
 */
export function buildTaskCleanupQuery(deletableTaskAge: number, nowMs: number): string {
  const threshold = Math.floor(nowMs - deletableTaskAge * 1000)
  return `completed:true AND task.start_time_in_millis:<${threshold}`
}

export class TaskCleanup {
  private readonly _withRetries: RetryFunction
  private readonly _waiter: AsyncTaskWaiter
  private readonly _now: () => number

  constructor(options: TaskCleanupOptions) {
    this._withRetries = options.withRetries
    this._waiter = options.waiter
    this._now = options.now ?? Date.now
  }

  /**
   * Delete up to `maxTasks` completed tasks older than `deletableTaskAge`
   * seconds.
   *
   * @returns Number of deleted task entries
   */
  async run(deletableTaskAge = 0, maxTasks?: number): Promise<number> {
    const q = buildTaskCleanupQuery(deletableTaskAge, this._now())

    const task = await this._withRetries(
      (connection) =>
        connection.deleteByQuery({
          index: TASKS_INDEX,
          q,
          waitForCompletion: false,
          conflicts: 'proceed',
          maxDocs: maxTasks,
        }),
      { index: TASKS_INDEX, label: 'delete_by_query' }
    )

    const result = await this._waiter.wait(task)
    return typeof result.deleted === 'number' ? result.deleted : 0
  }
}
