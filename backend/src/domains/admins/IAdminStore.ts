/**
 * IAdminStore Interface
 *
 * Storage for dynamically added admins. Handles arrive normalized.
 *
 * @module domains/admins/IAdminStore
 */

export interface IAdminStore {
  list(): Promise<string[]>;
  has(handle: string): Promise<boolean>;
  /** Returns false when the handle was already present */
  add(handle: string): Promise<boolean>;
  /** Returns false when the handle was absent */
  remove(handle: string): Promise<boolean>;
}
