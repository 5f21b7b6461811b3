import { RemoteTable, RemoteRowMap, RawRow } from './row-types';

/**
 * Table-level operations of the remote relational store, scoped the way a
 * REST client over the database exposes them. Every method rejects on a
 * network, permission or constraint failure.
 */
export interface RemoteTableClient {
  select(table: RemoteTable, userId: string): Promise<RawRow[]>;
  insert<T extends RemoteTable>(table: T, row: RemoteRowMap[T]): Promise<void>;
  upsert<T extends RemoteTable>(table: T, row: RemoteRowMap[T]): Promise<void>;
  update<T extends RemoteTable>(table: T, id: string, patch: Partial<RemoteRowMap[T]>): Promise<void>;
  delete(table: RemoteTable, id: string): Promise<void>;
}

/** Object storage for note images. */
export interface ImageStorage {
  /** Stores the object and returns its public URL. */
  upload(bucket: string, path: string, data: Uint8Array, contentType: string): Promise<string>;
  remove(bucket: string, paths: string[]): Promise<void>;
}
