/**
 * @file Async Task Waiter
 *
 * Long-running operations (delete-by-query, update-by-query, reindex) can be
 * started as server-side tasks. Waiting on one with a single long request
 * would trip the transport timeout, so the waiter polls with a short
 * server-side wait instead and treats the engine's `timeout_exception` as
 * "still running".
 */

import type { RetryFunction, TaskReference, TaskStatusResponse } from '../types/index.js'
import { isTaskPollTimeout } from '../retry/error-shapes.js'

/** Server-side wait per poll */
export const TASK_POLL_TIMEOUT = '5s'

/**
 * Payload of a finished task: the operation's own response when the task
 * reports one, otherwise the task's status object. Callers handle both.
 */
export type TaskResult = Record<string, unknown>

function extractResult(res: TaskStatusResponse): TaskResult {
  return res.response ?? res.task.status ?? {}
}

export class AsyncTaskWaiter {
  private readonly _withRetries: RetryFunction

  constructor(withRetries: RetryFunction) {
    this._withRetries = withRetries
  }

  /**
   * Poll a task until it finishes.
   *
   * @param task - Reference returned when the task was started
   * @param retryFunction - Wrapper used for each poll. Defaults to the store's `withRetries`.
   */
  async wait(task: TaskReference, retryFunction: RetryFunction = this._withRetries): Promise<TaskResult> {
    for (;;) {
      try {
        const res = await retryFunction(
          (connection) =>
            connection.getTask({
              taskId: task.task,
              waitForCompletion: true,
              timeout: TASK_POLL_TIMEOUT,
            }),
          { label: 'tasks.get' }
        )
        return extractResult(res)
      } catch (error) {
        if (!isTaskPollTimeout(error)) {
          throw error
        }
      }
    }
  }
}
