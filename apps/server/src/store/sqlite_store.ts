import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";

import { StoreUnavailableError } from "../errors";
import type { SampleStore } from "./index";

export type SqliteStoreConfig = {
  // ":memory:" keeps everything in process
  filePath: string;
};

type PayloadRow = { payload: string };

export class SqliteSampleStore implements SampleStore {
  readonly driver = "sqlite" as const;
  private db: Database.Database;
  private insertMany: (topic: string, records: string[]) => void;
  private selectPayloads: Database.Statement<[string], PayloadRow>;

  constructor(cfg: SqliteStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();

    const stmt = this.db.prepare(`insert into location_samples (topic, payload) values (?, ?)`);
    this.insertMany = this.db.transaction((topic: string, records: string[]) => {
      for (const r of records) stmt.run(topic, r);
    });
    this.selectPayloads = this.db.prepare<[string], PayloadRow>(
      `select payload from location_samples where topic = ?`
    );
  }

  private init(): void {
    // append-only
    this.db.exec(`
      create table if not exists location_samples (
        seq integer primary key autoincrement,
        topic text not null,
        payload text not null
      );

      create index if not exists idx_samples_topic on location_samples(topic);
    `);
  }

  async appendBatch(topic: string, records: string[]): Promise<void> {
    this.assertOpen();
    this.insertMany(topic, records);
  }

  async readAll(topic: string): Promise<string[]> {
    this.assertOpen();
    return this.selectPayloads.all(topic).map((r) => r.payload);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private assertOpen(): void {
    if (!this.db.open) throw new StoreUnavailableError("sqlite store is closed");
  }
}
