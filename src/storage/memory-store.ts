/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are
 * deep-copied on the way in and out so callers never share nested state
 * (a flow's Actions array, say) with the store.
 */

import { Store, FlowStore, StoredFlow, ListOptions } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryFlowStore implements FlowStore {
  private data = new Map<string, StoredFlow>();

  async create(flow: StoredFlow): Promise<StoredFlow> {
    const copy = deepCopy(flow);
    this.data.set(flow.id, copy);
    return deepCopy(copy);
  }

  async getById(id: string): Promise<StoredFlow | null> {
    const flow = this.data.get(id);
    return flow ? deepCopy(flow) : null;
  }

  async update(id: string, flow: StoredFlow): Promise<StoredFlow | null> {
    if (!this.data.has(id)) return null;
    const copy = deepCopy(flow);
    this.data.set(id, copy);
    return deepCopy(copy);
  }

  async list(options?: ListOptions): Promise<StoredFlow[]> {
    return applyListOptions([...this.data.values()].map(deepCopy), options);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    flows: new MemoryFlowStore(),
  };
}
