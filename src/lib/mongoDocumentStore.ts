import { Connection, Types, mongo } from 'mongoose';
import { requireDb } from './mongo';
import {
  CollectionName,
  DocumentFilter,
  DocumentStore,
  StoreInfo,
  StoredDocument,
  currentTimestamp,
} from './documentStore';

// The parts of a mongoose Connection the store relies on
export interface StoreConnection {
  name: string;
  db?: mongo.Db;
  collection: Connection['collection'];
}

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

// Renames _id to id and renders any Date values as ISO strings
const toStoredDocument = (doc: mongo.WithId<mongo.Document>): StoredDocument => {
  const { _id, ...fields } = doc;
  const serialized: StoredDocument = { id: String(_id) };

  for (const [key, value] of Object.entries(fields)) {
    serialized[key] = value instanceof Date ? value.toISOString() : value;
  }

  return serialized;
};

export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: StoreConnection) {}

  async create(collection: CollectionName, data: object): Promise<string> {
    const now = currentTimestamp();
    const result = await this.connection
      .collection(collection)
      .insertOne({ ...data, created_at: now, updated_at: now });

    return String(result.insertedId);
  }

  async find(collection: CollectionName, filter: DocumentFilter = {}, limit?: number): Promise<StoredDocument[]> {
    let cursor = this.connection.collection(collection).find(filter);
    if (limit !== undefined) {
      cursor = cursor.limit(limit);
    }

    const docs = await cursor.toArray();
    return docs.map(toStoredDocument);
  }

  async findById(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    if (!OBJECT_ID_PATTERN.test(id)) {
      return null;
    }

    const doc = await this.connection
      .collection(collection)
      .findOne({ _id: new Types.ObjectId(id) });

    return doc ? toStoredDocument(doc) : null;
  }

  async describe(): Promise<StoreInfo> {
    const collections = await requireDb(this.connection)
      .listCollections({}, { nameOnly: true })
      .toArray();

    return {
      name: this.connection.name,
      collections: collections.map(info => info.name),
    };
  }
}
