/** Shared FIFO of tasks; a task lives here or in exactly one worker's hands */
import type { Task, WorkItem } from '../types.js';
import { identityOf } from '../types.js';

export class TaskQueue<TItem extends WorkItem = WorkItem> {
  private items: Task<TItem>[] = [];
  private head = 0;

  static from<TItem extends WorkItem>(items: readonly TItem[]): TaskQueue<TItem> {
    const queue = new TaskQueue<TItem>();
    for (const item of items) queue.push({ item, identity: identityOf(item), retries: 0 });
    return queue;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  push(task: Task<TItem>): void {
    this.items.push(task);
  }

  /** Non-blocking: undefined when empty. */
  shift(): Task<TItem> | undefined {
    if (this.head >= this.items.length) return undefined;
    const task = this.items[this.head++];
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return task;
  }
}
