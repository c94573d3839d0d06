import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import type { QueryState } from "../../state.js";
import { CheckpointCorruptError } from "../../errors.js";
import { CheckpointRecordSchema, KeyedWriteQueue, type CheckpointRecord, type CheckpointStore } from "./checkpoint-store.js";

export type FileCheckpointStoreOptions = {
  directory: string;
  ttlMs?: number;
  now?: () => number;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One JSON file per thread under `directory`. Writes go to a temp file and are
 * renamed into place, so a reader sees either the old record or the new one.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;
  private readonly ttlMs: number | null;
  private readonly now: () => number;
  private readonly queue = new KeyedWriteQueue();

  constructor(options: FileCheckpointStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? Date.now;
  }

  // Thread ids are caller-supplied; hash them so any string maps to a safe file name.
  private fileFor(threadId: string): string {
    const digest = crypto.createHash("sha256").update(threadId).digest("hex");
    return path.join(this.directory, `${digest}.json`);
  }

  async load(threadId: string): Promise<CheckpointRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(threadId), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CheckpointCorruptError(threadId, error);
    }

    let record: CheckpointRecord;
    try {
      record = CheckpointRecordSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new CheckpointCorruptError(threadId, error);
    }
    if (record.thread_id !== threadId) throw new CheckpointCorruptError(threadId);
    if (this.ttlMs !== null && this.now() - record.updated_at > this.ttlMs) {
      await this.removeIfUnchanged(threadId, record.updated_at);
      return null;
    }
    return record;
  }

  // A save queued after the read may have replaced the expired file; leave that one alone.
  private removeIfUnchanged(threadId: string, updatedAt: number): Promise<void> {
    const file = this.fileFor(threadId);
    return this.queue.run(threadId, async () => {
      let stored: unknown;
      try {
        stored = JSON.parse(await readFile(file, "utf-8"));
      } catch (error) {
        if (isMissingFile(error)) return;
        throw new CheckpointCorruptError(threadId, error);
      }
      const current = CheckpointRecordSchema.safeParse(stored);
      if (current.success && current.data.updated_at === updatedAt) await rm(file, { force: true });
    });
  }

  save(threadId: string, state: QueryState): Promise<CheckpointRecord> {
    return this.queue.run(threadId, async () => {
      const record: CheckpointRecord = { thread_id: threadId, state, updated_at: this.now() };
      const target = this.fileFor(threadId);
      const temp = `${target}.${process.pid}.${crypto.randomUUID()}.tmp`;
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(record), "utf-8");
      await rename(temp, target);
      return record;
    });
  }

  delete(threadId: string): Promise<void> {
    return this.queue.run(threadId, () => rm(this.fileFor(threadId), { force: true }));
  }
}
