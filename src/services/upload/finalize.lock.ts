// src/services/upload/finalize.lock.ts

import PQueue from "p-queue";

/**
 * Per-key mutual exclusion: tasks sharing a key run one at a time, tasks on
 * different keys never wait on each other.
 */
export class KeyedLock {
  private readonly queues = new Map<string, PQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    try {
      return await queue.add(task, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0) {
        this.queues.delete(key);
      }
    }
  }

  /** Keys with a running or queued task. */
  activeKeys(): string[] {
    return [...this.queues.keys()];
  }
}
