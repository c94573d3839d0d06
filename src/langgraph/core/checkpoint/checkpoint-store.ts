import * as z from "zod";
import { QueryStateSchema, type QueryState } from "../../state.js";

export const CheckpointRecordSchema = z.object({
  thread_id: z.string().min(1),
  state: QueryStateSchema,
  updated_at: z.number(),
});

export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;

/**
 * Last-write-wins storage of one QueryState per conversation.
 * `load` resolves null for unknown or expired threads.
 */
export interface CheckpointStore {
  load(threadId: string): Promise<CheckpointRecord | null>;
  save(threadId: string, state: QueryState): Promise<CheckpointRecord>;
  delete(threadId: string): Promise<void>;
}

/**
 * Chains work per key so writes for one thread never interleave.
 * Different keys run independently.
 */
export class KeyedWriteQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(work, work);
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }
}

export type InMemoryCheckpointStoreOptions = {
  ttlMs?: number;
  now?: () => number;
};

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, CheckpointRecord>();
  private readonly queue = new KeyedWriteQueue();
  private readonly ttlMs: number | null;
  private readonly now: () => number;

  constructor(options: InMemoryCheckpointStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.records.size;
  }

  private isExpired(record: CheckpointRecord, at: number): boolean {
    return this.ttlMs !== null && at - record.updated_at > this.ttlMs;
  }

  // Abandoned threads are never loaded again, so expiry is swept on every write.
  private sweepExpired(at: number): void {
    if (this.ttlMs === null) return;
    for (const [threadId, record] of this.records) {
      if (this.isExpired(record, at)) this.records.delete(threadId);
    }
  }

  async load(threadId: string): Promise<CheckpointRecord | null> {
    const record = this.records.get(threadId);
    if (!record) return null;
    if (this.isExpired(record, this.now())) {
      this.records.delete(threadId);
      return null;
    }
    return structuredClone(record);
  }

  save(threadId: string, state: QueryState): Promise<CheckpointRecord> {
    return this.queue.run(threadId, async () => {
      const at = this.now();
      this.sweepExpired(at);
      const record: CheckpointRecord = { thread_id: threadId, state: structuredClone(state), updated_at: at };
      this.records.set(threadId, record);
      return structuredClone(record);
    });
  }

  delete(threadId: string): Promise<void> {
    return this.queue.run(threadId, async () => {
      this.records.delete(threadId);
    });
  }
}
