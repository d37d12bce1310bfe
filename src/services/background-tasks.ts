/**
 * Background task runner
 *
 * Fire-and-forget execution for work the ingestion path must not wait on
 * (cache writes, classification). Tasks start on a later event-loop turn.
 * Failures are logged and dropped; nothing is retried.
 */

import { setImmediate as nextTick } from 'timers/promises';
import { errorMessage, type ServiceLogger } from '../utils/logger';

export type BackgroundTask = () => void | Promise<void>;

export class BackgroundTaskRunner {
  private readonly inFlight = new Set<Promise<void>>();
  private failed = 0;

  constructor(private readonly logger: ServiceLogger) {}

  submit(name: string, task: BackgroundTask): void {
    const run: Promise<void> = nextTick()
      .then(() => task())
      .catch((error: unknown) => {
        this.failed++;
        this.logger.error('Background task failed', {
          task: name,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  get failedCount(): number {
    return this.failed;
  }

  /**
   * Resolves once every submitted task, including ones submitted while
   * waiting, has settled.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }
}
