import type { JsonObject } from '../../types/index.js';
import type { MaybePromise } from '../types.js';

/** Where the example order types write approved records. */
export interface RecordSink {
  upsert(collection: string, key: string, data: JsonObject): MaybePromise<void>;
}

export class MemoryRecordSink implements RecordSink {
  private collections = new Map<string, Map<string, JsonObject>>();
  writes = 0;

  upsert(collection: string, key: string, data: JsonObject): void {
    let records = this.collections.get(collection);
    if (!records) {
      records = new Map();
      this.collections.set(collection, records);
    }
    records.set(key, data);
    this.writes += 1;
  }

  get(collection: string, key: string): JsonObject | null {
    return this.collections.get(collection)?.get(key) ?? null;
  }

  count(collection: string): number {
    return this.collections.get(collection)?.size ?? 0;
  }
}
