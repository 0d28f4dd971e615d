/**
 * In-memory IAdminStore. Contents are lost on restart.
 *
 * @module domains/admins/InMemoryAdminStore
 */

import type { IAdminStore } from './IAdminStore';

export class InMemoryAdminStore implements IAdminStore {
  private readonly handles: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.handles = new Set(initial);
  }

  async list(): Promise<string[]> {
    return [...this.handles];
  }

  async has(handle: string): Promise<boolean> {
    return this.handles.has(handle);
  }

  async add(handle: string): Promise<boolean> {
    if (this.handles.has(handle)) {
      return false;
    }
    this.handles.add(handle);
    return true;
  }

  async remove(handle: string): Promise<boolean> {
    return this.handles.delete(handle);
  }
}
