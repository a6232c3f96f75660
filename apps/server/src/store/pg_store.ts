import { Pool } from "pg";

import { StoreUnavailableError } from "../errors";
import type { SampleStore } from "./index";

type PayloadRow = { payload: string };

export class PgSampleStore implements SampleStore {
  readonly driver = "postgres" as const;
  private pool: Pool;
  private ready = false;
  private closed = false;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r.rows.length) throw new StoreUnavailableError("pg ping failed");
  }

  async init(): Promise<void> {
    await this.ping();
    await this.pool.query(`
      create table if not exists location_samples (
        seq bigserial primary key,
        topic text not null,
        payload text not null
      )
    `);
    await this.pool.query(`create index if not exists idx_samples_topic on location_samples(topic)`);
    this.ready = true;
  }

  async appendBatch(topic: string, records: string[]): Promise<void> {
    this.assertReady();
    if (!records.length) return;
    // One statement per batch; unnest keeps the parameter count fixed.
    await this.pool.query(
      `insert into location_samples (topic, payload)
       select $1, p from unnest($2::text[]) as t(p)`,
      [topic, records]
    );
  }

  async readAll(topic: string): Promise<string[]> {
    this.assertReady();
    try {
      const r = await this.pool.query<PayloadRow>(`select payload from location_samples where topic = $1`, [topic]);
      return r.rows.map((row) => row.payload);
    } catch (e) {
      throw new StoreUnavailableError(`failed to read ${topic}`, { cause: e });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
  }

  private assertReady(): void {
    if (this.closed || !this.ready) throw new StoreUnavailableError("postgres store is not initialized");
  }
}
