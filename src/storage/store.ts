/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting compiled flow documents with pluggable
 * backends. Only the in-memory backend ships with the library.
 */

import { FlowDocument } from '../dsl/wire';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** A compiled flow document kept by the service. */
export interface StoredFlow {
  id: string;
  name: string;
  /** Monotonically increasing revision number. */
  revision: number;
  document: FlowDocument;
  createdAt: string;
  updatedAt: string;
}

/** Store interface for flows. */
export interface FlowStore {
  create(flow: StoredFlow): Promise<StoredFlow>;
  getById(id: string): Promise<StoredFlow | null>;
  update(id: string, flow: StoredFlow): Promise<StoredFlow | null>;
  list(options?: ListOptions): Promise<StoredFlow[]>;
  delete(id: string): Promise<boolean>;
}

/** Aggregate store. */
export interface Store {
  flows: FlowStore;
}
