import type { PageTask } from "../pipeline/pageTask";
import type { TierContext, TierDriver } from "./types";

export class SequentialTier implements TierDriver {
  readonly kind = "sequential";

  async run(tasks: readonly PageTask[], context: TierContext): Promise<void> {
    for (const task of tasks) {
      if (context.signal.aborted) {
        return;
      }
      await context.runPage(task);
    }
  }
}
