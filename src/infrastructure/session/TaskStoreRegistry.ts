import { TaskStore } from '../../domain/task/services/TaskStore.js';

/**
 * Keeps one task store per session so sessions never share state
 */
export class TaskStoreRegistry {
  private stores = new Map<string, TaskStore>();

  constructor(private readonly createStore: () => TaskStore = () => new TaskStore()) {}

  /**
   * Get the store for a session, creating an empty one on first use
   */
  get(sessionId: string): TaskStore {
    let store = this.stores.get(sessionId);
    if (!store) {
      store = this.createStore();
      this.stores.set(sessionId, store);
    }
    return store;
  }

  has(sessionId: string): boolean {
    return this.stores.has(sessionId);
  }

  /**
   * Discard a session's store
   * @returns whether a store existed
   */
  drop(sessionId: string): boolean {
    return this.stores.delete(sessionId);
  }

  get size(): number {
    return this.stores.size;
  }
}
