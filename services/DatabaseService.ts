import { MongoClient, Db, Collection, ClientSession } from 'mongodb';
import dotenv from 'dotenv';
import { MaterialRecord, MaterialRecordStore, MaterialRecordTransaction } from '../types';

dotenv.config();

const DATABASE_NAME = 'compliance';
const COLLECTION_NAME = 'material_records';

class MongoMaterialRecordTransaction implements MaterialRecordTransaction {
  constructor(
    private collection: Collection<MaterialRecord>,
    private session: ClientSession
  ) {}

  async find(materialId: string): Promise<MaterialRecord | null> {
    return await this.collection.findOne({ materialId }, { session: this.session, projection: { _id: 0 } });
  }

  async insert(record: MaterialRecord): Promise<void> {
    await this.collection.insertOne({ ...record }, { session: this.session });
  }

  async replace(record: MaterialRecord): Promise<void> {
    const result = await this.collection.replaceOne({ materialId: record.materialId }, record, { session: this.session });
    if (result.matchedCount === 0) {
      throw new Error(`Material record ${record.materialId} not found`);
    }
  }
}

/**
 * MaterialRecord persistence. Transactions need MongoDB running as a replica
 * set (Atlas, or a single-node replica set locally).
 */
class DatabaseService implements MaterialRecordStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private recordsCollection: Collection<MaterialRecord> | null = null;
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected && this.db) {
      return;
    }

    const uri = process.env.MONGODB_URI;
    if (!uri) {
      throw new Error('MONGODB_URI environment variable is not set');
    }

    this.client = new MongoClient(uri);
    await this.client.connect();
    this.db = this.client.db(DATABASE_NAME);
    this.recordsCollection = this.db.collection<MaterialRecord>(COLLECTION_NAME);
    await this.recordsCollection.createIndex({ materialId: 1 }, { unique: true });
    this.isConnected = true;
    console.log(`[Database] Connected to ${DATABASE_NAME}.${COLLECTION_NAME}`);
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.isConnected = false;
      this.db = null;
      this.recordsCollection = null;
    }
  }

  private async ensureConnected(): Promise<{ client: MongoClient; collection: Collection<MaterialRecord> }> {
    if (!this.isConnected) {
      await this.connect();
    }
    if (!this.client || !this.recordsCollection) throw new Error('Database not initialized');
    return { client: this.client, collection: this.recordsCollection };
  }

  async withTransaction<T>(work: (tx: MaterialRecordTransaction) => Promise<T>): Promise<T> {
    const { client, collection } = await this.ensureConnected();
    const session = client.startSession();
    const results: T[] = [];

    try {
      await session.withTransaction(async () => {
        // the driver may retry the callback on transient errors
        results.length = 0;
        results.push(await work(new MongoMaterialRecordTransaction(collection, session)));
      });
    } catch (error) {
      throw new Error(`Material record transaction failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    } finally {
      await session.endSession();
    }

    if (results.length === 0) {
      throw new Error('Material record transaction did not complete');
    }
    return results[results.length - 1];
  }

  async list(materialId?: string): Promise<MaterialRecord[]> {
    const { collection } = await this.ensureConnected();
    const filter = materialId ? { materialId } : {};
    return await collection
      .find(filter, { projection: { _id: 0 } })
      .sort({ materialId: 1 })
      .toArray();
  }
}

export const db = new DatabaseService();
