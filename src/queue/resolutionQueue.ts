import PQueue from "p-queue";
import { QueueFullError } from "../errors";

/** Caps how many searches and extractions run against upstream at once. */
export class ResolutionQueue {
  private readonly queue: PQueue;

  constructor(concurrency: number, private readonly maxPending: number) {
    this.queue = new PQueue({ concurrency });
  }

  get pending(): number {
    return this.queue.size;
  }

  get running(): number {
    return this.queue.pending;
  }

  async add<T>(task: () => Promise<T>): Promise<T> {
    if (this.queue.size >= this.maxPending) throw new QueueFullError(this.maxPending);
    return this.queue.add(task);
  }
}
