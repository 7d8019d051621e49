import { processWithConcurrency } from "../core/concurrency";
import type { PageTask } from "../pipeline/pageTask";
import type { TierContext, TierDriver } from "./types";

/**
 * Fixed pool of workers pulling from one shared queue. The workers are
 * cooperative loops on the event loop; page work is I/O bound, so a pool of
 * OS threads would add nothing but copying. A worker whose page is waiting on
 * the persister takes no new page.
 */
export class ThreadPoolTier implements TierDriver {
  readonly kind = "thread_pool";
  private readonly workerCount: number;

  constructor(workerCount: number) {
    this.workerCount = workerCount;
  }

  async run(tasks: readonly PageTask[], context: TierContext): Promise<void> {
    context.logger.debug("thread_pool_start", { workers: this.workerCount, tasks: tasks.length });
    await processWithConcurrency(tasks, this.workerCount, (task) => context.runPage(task), () => context.signal.aborted);
  }
}
