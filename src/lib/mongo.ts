import { MongoClient, type Db } from "mongodb";

import type { DocumentStore, Filter } from "./storage.js";
import type { CollectionName, Collections, Stored } from "./types.js";

export class MongoStore implements DocumentStore {
  private readonly client: MongoClient;
  private readonly db: Db;

  constructor(url: string, dbName: string) {
    this.client = new MongoClient(url);
    this.db = this.client.db(dbName);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async insert<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<string> {
    // insertOne writes the generated _id back onto its argument, so hand it a copy
    const result = await this.db.collection(collection).insertOne({ ...doc });
    return String(result.insertedId);
  }

  async find<K extends CollectionName>(collection: K, filter: Filter, limit: number): Promise<Stored<Collections[K]>[]> {
    const rows = await this.db.collection(collection).find(filter).limit(limit).toArray();
    return rows.map(({ _id, ...rest }) => ({ ...rest, _id: String(_id) }) as Stored<Collections[K]>);
  }

  async collectionNames(): Promise<string[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((c) => c.name);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
