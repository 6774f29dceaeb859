import { Logger } from '../logging/logger.js';
import { ConfigurationError, ToolTimeoutError, describeError } from './errors.js';

/**
 * Runs remote tool calls on behalf of the conversation loop
 */
export interface ToolExecutor {
  submit<T>(task: () => Promise<T>): Promise<T>;
}

export interface SerialExecutorOptions {
  /** Per-task limit in milliseconds; 0 disables it */
  timeoutMs?: number;
}

interface QueuedTask {
  run: () => Promise<void>;
  cancel: (error: Error) => void;
}

/**
 * SerialExecutor - One task at a time, in submission order.
 *
 * A task that exceeds the timeout is rejected with a ToolTimeoutError and the
 * queue moves on; the underlying call is abandoned, not cancelled.
 */
export class SerialExecutor implements ToolExecutor {
  private queue: QueuedTask[] = [];
  private processing = false;
  private closed = false;
  private readonly timeoutMs: number;
  private logger: Logger;

  constructor(options: SerialExecutorOptions = {}, logger?: Logger) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.logger = (logger ?? new Logger()).child({ component: 'executor' });
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.closed) {
        reject(new ConfigurationError('Executor has been closed'));
        return;
      }

      this.queue.push({
        run: async () => {
          try {
            resolve(await this.withTimeout(task));
          } catch (error) {
            reject(error);
          }
        },
        cancel: reject,
      });

      void this.processQueue();
    });
  }

  /**
   * Tasks waiting behind the one currently running
   */
  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.processing;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Rejects every queued task; a running task is left to finish
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const dropped = this.queue;
    this.queue = [];
    for (const task of dropped) {
      task.cancel(new ConfigurationError('Executor closed before the task ran'));
    }

    await this.logger.debug('Executor closed', { dropped: dropped.length });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    let task = this.queue.shift();
    while (task) {
      await task.run();
      task = this.queue.shift();
    }

    this.processing = false;
  }

  private async withTimeout<T>(task: () => Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) {
      return task();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ToolTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([task(), timeout]);
    } catch (error) {
      if (error instanceof ToolTimeoutError) {
        await this.logger.warn('Tool task timed out', { timeoutMs: this.timeoutMs });
      } else {
        await this.logger.debug('Tool task failed', { error: describeError(error) });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
