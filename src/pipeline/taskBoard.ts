import { PageTask } from "./pageTask";

export interface TaskBoardTally {
  succeeded: number[];
  failed: number[];
  incomplete: number[];
}

/** Owns the run's PageTasks, one per seeded page number. */
export class TaskBoard {
  private readonly tasks = new Map<number, PageTask>();

  constructor(pageNumbers: readonly number[], maxAttempts: number) {
    for (const pageNumber of [...pageNumbers].sort((a, b) => a - b)) {
      if (!this.tasks.has(pageNumber)) {
        this.tasks.set(pageNumber, new PageTask(pageNumber, maxAttempts));
      }
    }
  }

  get size(): number {
    return this.tasks.size;
  }

  get(pageNumber: number): PageTask | undefined {
    return this.tasks.get(pageNumber);
  }

  all(): PageTask[] {
    return [...this.tasks.values()];
  }

  markPersisted(pageNumbers: readonly number[]): void {
    for (const pageNumber of pageNumbers) {
      const task = this.tasks.get(pageNumber);
      if (task?.status === "parsed") {
        task.persisted();
      }
    }
  }

  /** Anything neither persisted nor failed is incomplete, including parsed pages whose batch never committed. */
  tally(): TaskBoardTally {
    const tally: TaskBoardTally = { succeeded: [], failed: [], incomplete: [] };
    for (const task of this.tasks.values()) {
      if (task.status === "persisted") {
        tally.succeeded.push(task.pageNumber);
      } else if (task.status === "failed") {
        tally.failed.push(task.pageNumber);
      } else {
        tally.incomplete.push(task.pageNumber);
      }
    }
    return tally;
  }
}
