import pLimit from "p-limit";
import type { PageTask } from "../pipeline/pageTask";
import type { TierContext, TierDriver } from "./types";

/** Schedules every task up front behind a FIFO gate of `concurrency` slots. */
export class AsyncIoTier implements TierDriver {
  readonly kind = "async_io";
  private readonly concurrency: number;

  constructor(concurrency: number) {
    this.concurrency = concurrency;
  }

  async run(tasks: readonly PageTask[], context: TierContext): Promise<void> {
    const limit = pLimit(Math.max(1, this.concurrency));
    await Promise.all(
      tasks.map((task) =>
        limit(async () => {
          if (context.signal.aborted) {
            return;
          }
          await context.runPage(task);
        }),
      ),
    );
  }
}
