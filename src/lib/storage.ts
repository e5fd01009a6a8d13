import { promises as fs } from "node:fs";
import path from "node:path";

import type { Config } from "./config.js";
import { newId } from "./id.js";
import { MongoStore } from "./mongo.js";
import type { CollectionName, Collections, Stored } from "./types.js";

/** Equality on a string, or membership in a list of candidates. Array fields match on any element. */
export type FieldCondition = string | { $in: string[] };

/** AND of field conditions; `{}` matches every document. */
export type Filter = Record<string, FieldCondition>;

export interface DocumentStore {
  insert<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<string>;
  find<K extends CollectionName>(collection: K, filter: Filter, limit: number): Promise<Stored<Collections[K]>[]>;
  collectionNames(): Promise<string[]>;
  close(): Promise<void>;
}

export class StoreUnavailableError extends Error {
  constructor() {
    super("Database not available");
    this.name = "StoreUnavailableError";
  }
}

/** Builds a filter from the conditions that are present. */
export function filterOf(conditions: Record<string, FieldCondition | undefined>): Filter {
  const filter: Filter = {};
  for (const [field, condition] of Object.entries(conditions)) {
    if (condition !== undefined) filter[field] = condition;
  }
  return filter;
}

export function matchesFilter(doc: object, filter: Filter): boolean {
  const fields = new Map<string, unknown>(Object.entries(doc));
  return Object.entries(filter).every(([field, condition]) => {
    const wanted = typeof condition === "string" ? [condition] : condition.$in;
    const value = fields.get(field);
    const values: unknown[] = Array.isArray(value) ? value : [value];
    return values.some((v) => typeof v === "string" && wanted.includes(v));
  });
}

async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function readJson<T>(dir: string, fileName: string, fallback: T): Promise<T> {
  await ensureDir(dir);
  const full = path.join(dir, fileName);
  try {
    const raw = await fs.readFile(full, "utf-8");
    return JSON.parse(raw) as T;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return fallback;
    throw err;
  }
}

export async function writeJson<T>(dir: string, fileName: string, data: T): Promise<void> {
  await ensureDir(dir);
  const full = path.join(dir, fileName);
  const tmp = full + ".tmp";
  await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf-8");
  await fs.rename(tmp, full);
}

/**
 * One JSON array file per collection under `dir`. Writes are serialized so
 * concurrent inserts into the same file never lose a document.
 */
export class JsonFileStore implements DocumentStore {
  private pending: Promise<unknown> = Promise.resolve();

  constructor(readonly dir: string) {}

  async insert<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<string> {
    const id = newId();
    await this.serialize(async () => {
      const docs = await readJson<Stored<Collections[K]>[]>(this.dir, `${collection}.json`, []);
      docs.push({ ...doc, _id: id });
      await writeJson(this.dir, `${collection}.json`, docs);
    });
    return id;
  }

  async find<K extends CollectionName>(collection: K, filter: Filter, limit: number): Promise<Stored<Collections[K]>[]> {
    const docs = await readJson<Stored<Collections[K]>[]>(this.dir, `${collection}.json`, []);
    return docs.filter((doc) => matchesFilter(doc, filter)).slice(0, limit);
  }

  async collectionNames(): Promise<string[]> {
    await ensureDir(this.dir);
    const entries = await fs.readdir(this.dir);
    return entries.filter((f) => f.endsWith(".json")).map((f) => f.slice(0, -".json".length));
  }

  async close(): Promise<void> {
    await this.pending;
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.pending.then(task);
    this.pending = run.catch(() => undefined);
    return run;
  }
}

/**
 * Opens the store selected by the configuration, or returns null when none
 * is configured. A store that fails to connect is still returned so the
 * health report can show the error.
 */
export async function openStore(config: Config): Promise<DocumentStore | null> {
  if (config.databaseUrl) {
    let store: MongoStore;
    try {
      store = new MongoStore(config.databaseUrl, config.databaseName);
    } catch (err) {
      console.error("Invalid DATABASE_URL, running without a database:", err);
      return null;
    }
    try {
      await store.connect();
      console.log(`Connected to MongoDB database "${config.databaseName}"`);
    } catch (err) {
      console.error("MongoDB connection failed, will retry on first use:", err);
    }
    return store;
  }

  if (config.dataDir) {
    console.log(`Using JSON file store in ${config.dataDir}`);
    return new JsonFileStore(config.dataDir);
  }

  console.warn("No DATABASE_URL or DATA_DIR set, running without a database");
  return null;
}
