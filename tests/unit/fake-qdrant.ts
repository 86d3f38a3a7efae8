import type {
  Condition,
  Filter,
  Payload,
  PayloadFieldSchema,
  PointId,
  PointRecord,
  PointStruct,
  PointsClient,
  ScoredPoint,
  ScrollPage,
} from '../../src/store/qdrant-client.js';

interface FakeCollection {
  size: number;
  points: Map<string, PointStruct>;
  indexes: Map<string, PayloadFieldSchema>;
}

/**
 * In-process stand-in for the vector service: evaluates match/range filters
 * and cosine similarity itself, and rejects vectors of the wrong width.
 */
export class FakePointsClient implements PointsClient {
  readonly collections = new Map<string, FakeCollection>();
  reachable = true;
  createdCollections: string[] = [];

  async ping(): Promise<void> {
    if (!this.reachable) throw new Error('connect ECONNREFUSED 127.0.0.1:6333');
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.collections.has(collection);
  }

  async createCollection(collection: string, vectorSize: number): Promise<void> {
    if (this.collections.has(collection)) {
      throw new Error(`collection ${collection} already exists`);
    }
    this.collections.set(collection, { size: vectorSize, points: new Map(), indexes: new Map() });
    this.createdCollections.push(collection);
  }

  async createPayloadIndex(collection: string, field: string, schema: PayloadFieldSchema): Promise<void> {
    this.require(collection).indexes.set(field, schema);
  }

  async upsert(collection: string, points: PointStruct[]): Promise<void> {
    const target = this.require(collection);
    for (const point of points) {
      if (point.vector.length !== target.size) {
        throw new Error(`wrong vector dimension: expected ${target.size}, got ${point.vector.length}`);
      }
    }
    for (const point of points) {
      target.points.set(point.id, structuredClone(point));
    }
  }

  async retrieve(collection: string, ids: string[]): Promise<PointRecord[]> {
    const target = this.require(collection);
    return ids.flatMap((id) => {
      const point = target.points.get(id);
      return point ? [{ id: point.id, payload: structuredClone(point.payload) }] : [];
    });
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const target = this.require(collection);
    for (const id of ids) target.points.delete(id);
  }

  async query(collection: string, vector: number[], filter: Filter, limit: number): Promise<ScoredPoint[]> {
    const target = this.require(collection);
    if (vector.length !== target.size) {
      throw new Error(`wrong vector dimension: expected ${target.size}, got ${vector.length}`);
    }

    return [...target.points.values()]
      .filter((point) => matchesFilter(point.payload, filter))
      .map((point) => ({
        id: point.id,
        payload: structuredClone(point.payload),
        score: cosineSimilarity(vector, point.vector),
      }))
      .sort((a, b) => b.score - a.score || compareIds(a.id, b.id))
      .slice(0, limit);
  }

  async scroll(collection: string, filter: Filter, limit: number, offset?: PointId): Promise<ScrollPage> {
    const target = this.require(collection);
    const matched = [...target.points.values()]
      .filter((point) => matchesFilter(point.payload, filter))
      .sort((a, b) => compareIds(a.id, b.id))
      .filter((point) => offset === undefined || compareIds(point.id, String(offset)) >= 0);

    const page = matched.slice(0, limit);
    const next = matched[limit];
    return {
      points: page.map((point) => ({ id: point.id, payload: structuredClone(point.payload) })),
      nextOffset: next ? next.id : null,
    };
  }

  private require(collection: string): FakeCollection {
    const target = this.collections.get(collection);
    if (!target) throw new Error(`collection ${collection} not found`);
    return target;
  }
}

function matchesFilter(payload: Payload, filter: Filter): boolean {
  return filter.must.every((condition) => matchesCondition(payload, condition));
}

function matchesCondition(payload: Payload, condition: Condition): boolean {
  const value = payload[condition.key];

  if ('match' in condition) {
    if (Array.isArray(value)) return value.includes(condition.match.value);
    return value === condition.match.value;
  }

  if (typeof value !== 'number') return false;
  const { gte, lt } = condition.range;
  if (gte !== undefined && value < gte) return false;
  if (lt !== undefined && value >= lt) return false;
  return true;
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  // Zero vectors rank as opposite, matching the local distance of 2
  return denominator === 0 ? -1 : dot / denominator;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
