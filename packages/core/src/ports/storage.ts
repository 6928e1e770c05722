import { type RuntimeResource } from '../lifecycle';

/**
 * Flat key/value file store. Paths are relative to whatever root the adapter
 * was created with; `put` returns the location the file can be found at.
 */
export interface FileStoragePort extends RuntimeResource {
  put(path: string, data: Buffer | string): Promise<string>;
  get(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
}
