import { StoreUnavailableError } from "../errors";
import type { SampleStore } from "./index";

// Process-local store. Used by DB_DRIVER=memory and by tests.
export class MemoryStore implements SampleStore {
  readonly driver = "memory" as const;
  private topics = new Map<string, string[]>();
  private closed = false;

  async appendBatch(topic: string, records: string[]): Promise<void> {
    this.assertOpen();
    const cur = this.topics.get(topic);
    if (cur) cur.push(...records);
    else this.topics.set(topic, records.slice());
  }

  async readAll(topic: string): Promise<string[]> {
    this.assertOpen();
    return (this.topics.get(topic) ?? []).slice();
  }

  count(topic: string): number {
    return this.topics.get(topic)?.length ?? 0;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreUnavailableError("memory store is closed");
  }
}
