import { QdrantClient } from '@qdrant/js-client-rest';

export type PointId = string | number;

export type Payload = Record<string, unknown>;

export type Condition =
  | { key: string; match: { value: string } }
  | { key: string; range: { gte?: number; lt?: number } };

export interface Filter {
  must: Condition[];
}

export interface PointStruct {
  id: string;
  vector: number[];
  payload: Payload;
}

export interface PointRecord {
  id: PointId;
  payload?: Payload | null;
}

export interface ScoredPoint extends PointRecord {
  score: number;
}

export interface ScrollPage {
  points: PointRecord[];
  nextOffset: PointId | null;
}

export type PayloadFieldSchema = 'keyword' | 'float';

/**
 * The slice of the vector service the remote backend talks to. Kept narrow so
 * tests can swap in an in-process implementation.
 */
export interface PointsClient {
  /** Cheap round trip used to fail fast when the service is unreachable. */
  ping(): Promise<void>;
  collectionExists(collection: string): Promise<boolean>;
  createCollection(collection: string, vectorSize: number): Promise<void>;
  createPayloadIndex(collection: string, field: string, schema: PayloadFieldSchema): Promise<void>;
  upsert(collection: string, points: PointStruct[]): Promise<void>;
  retrieve(collection: string, ids: string[]): Promise<PointRecord[]>;
  delete(collection: string, ids: string[]): Promise<void>;
  query(collection: string, vector: number[], filter: Filter, limit: number): Promise<ScoredPoint[]>;
  scroll(collection: string, filter: Filter, limit: number, offset?: PointId): Promise<ScrollPage>;
}

export interface QdrantConnection {
  url: string;
  apiKey?: string;
}

/** PointsClient over the Qdrant REST API. */
export class QdrantRestClient implements PointsClient {
  private readonly client: QdrantClient;

  constructor(connection: QdrantConnection) {
    this.client = new QdrantClient({ url: connection.url, apiKey: connection.apiKey });
  }

  async ping(): Promise<void> {
    await this.client.getCollections();
  }

  async collectionExists(collection: string): Promise<boolean> {
    const result = await this.client.collectionExists(collection);
    return result.exists;
  }

  async createCollection(collection: string, vectorSize: number): Promise<void> {
    await this.client.createCollection(collection, {
      vectors: { size: vectorSize, distance: 'Cosine' },
    });
  }

  async createPayloadIndex(collection: string, field: string, schema: PayloadFieldSchema): Promise<void> {
    await this.client.createPayloadIndex(collection, {
      field_name: field,
      field_schema: schema,
      wait: true,
    });
  }

  async upsert(collection: string, points: PointStruct[]): Promise<void> {
    await this.client.upsert(collection, { wait: true, points });
  }

  async retrieve(collection: string, ids: string[]): Promise<PointRecord[]> {
    const records = await this.client.retrieve(collection, {
      ids,
      with_payload: true,
      with_vector: false,
    });
    return records.map((record) => ({ id: record.id, payload: record.payload }));
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    await this.client.delete(collection, { wait: true, points: ids });
  }

  async query(collection: string, vector: number[], filter: Filter, limit: number): Promise<ScoredPoint[]> {
    const response = await this.client.query(collection, {
      query: vector,
      filter,
      limit,
      with_payload: true,
    });
    return response.points.map((point) => ({
      id: point.id,
      payload: point.payload,
      score: point.score,
    }));
  }

  async scroll(collection: string, filter: Filter, limit: number, offset?: PointId): Promise<ScrollPage> {
    const response = await this.client.scroll(collection, {
      filter,
      limit,
      offset,
      with_payload: true,
      with_vector: false,
    });
    return {
      points: response.points.map((point) => ({ id: point.id, payload: point.payload })),
      nextOffset: response.next_page_offset ?? null,
    };
  }
}
