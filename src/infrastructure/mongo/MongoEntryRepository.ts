import { MongoClient, type AnyBulkWriteOperation, type Collection } from "mongodb";
import type { EntryDoc, EntryRepository } from "../../ports/EntryRepository";
import { mongoIndexes } from "./mongo.indexes";

// Re-scanning a range rewrites the payload but keeps the document identity.
export const toUpsertOp = (doc: EntryDoc): AnyBulkWriteOperation<EntryDoc> => ({
  updateOne: {
    filter: { logUri: doc.logUri, index: doc.index },
    update: {
      $setOnInsert: { logUri: doc.logUri, index: doc.index },
      $set: { leafInput: doc.leafInput, extraData: doc.extraData, scannedAt: doc.scannedAt }
    },
    upsert: true
  }
});

/**
 * Entries keyed by `(logUri, index)`. Handler workers flush concurrently, so
 * the first write opens the connection and every other write awaits it.
 */
export class MongoEntryRepository implements EntryRepository {
  private client?: MongoClient;
  private collection?: Promise<Collection<EntryDoc>>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "ctscan",
    private readonly collectionName = "entries"
  ) {}

  private async openCollection(): Promise<Collection<EntryDoc>> {
    const client = new MongoClient(this.mongoUri);
    this.client = client;
    await client.connect();

    const col = client.db(this.dbName).collection<EntryDoc>(this.collectionName);
    for (const idx of mongoIndexes.entryCollection) {
      await col.createIndex(idx.keys, idx.options);
    }
    return col;
  }

  private getCollection(): Promise<Collection<EntryDoc>> {
    if (!this.collection) {
      const opening = this.openCollection();
      this.collection = opening;
      // A failed connect is not cached; the next write tries again.
      opening.catch(() => {
        if (this.collection === opening) this.collection = undefined;
      });
    }
    return this.collection;
  }

  async upsertMany(docs: EntryDoc[]): Promise<{ upserted: number; modified: number }> {
    if (docs.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const res = await col.bulkWrite(docs.map(toUpsertOp), { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.collection = undefined;
    await client?.close();
  }
}
