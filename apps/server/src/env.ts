import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export type StoreDriver = "sqlite" | "postgres" | "memory";

export type ServerEnv = {
  port: number;
  host: string;
  logLevel: string;
  dbDriver: StoreDriver;
  dbPath: string;
  databaseUrl: string;
};

function unquote(v: string): string {
  const q = v[0];
  return v.length >= 2 && (q === '"' || q === "'") && v.endsWith(q) ? v.slice(1, -1) : v;
}

/** KEY=value lines into process.env. Variables already set are left alone. */
export function loadDotEnvFile(file: string): void {
  if (!fs.existsSync(file)) return;
  for (const raw of fs.readFileSync(file, "utf8").split(/\r?\n/)) {
    const line = raw.trim();
    const eq = line.indexOf("=");
    if (line.startsWith("#") || eq <= 0) continue;
    const key = line.slice(0, eq);
    if (!/^[A-Za-z_]\w*$/.test(key) || process.env[key] !== undefined) continue;
    process.env[key] = unquote(line.slice(eq + 1));
  }
}

// Repo root .env first, then the package-local one.
export function loadEnv(): void {
  const here = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.resolve(here, "..", "..", "..", ".env"));
  loadDotEnvFile(path.resolve(here, "..", ".env"));
}

function parseDriver(v: string | undefined): StoreDriver {
  const driver = (v ?? "sqlite").toLowerCase();
  if (driver === "sqlite" || driver === "postgres" || driver === "memory") return driver;
  throw new Error(`DB_DRIVER=${driver} not supported (sqlite | postgres | memory)`);
}

function parsePort(v: string | undefined): number {
  const n = Number(v ?? 8080);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new Error(`invalid PORT: ${v}`);
  return n;
}

export function readServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  return {
    port: parsePort(env.PORT),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    dbDriver: parseDriver(env.DB_DRIVER),
    dbPath: env.DB_PATH ?? path.join("data", "driftsim.sqlite"),
    databaseUrl: env.DATABASE_URL ?? "",
  };
}
