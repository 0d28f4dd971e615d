/**
 * AdminRegistry
 *
 * Who may submit transfers and operate the relay. Permanent admins come
 * from configuration and cannot be removed; dynamic admins live in an
 * IAdminStore.
 *
 * @module domains/admins/AdminRegistry
 */

import type { Logger } from 'pino';
import { normalizeUserHandle } from '@blob-relay/shared';
import { env } from '@/infrastructure/config';
import { createChildLogger } from '@/shared/utils/logger';
import type { IAdminStore } from './IAdminStore';
import { InMemoryAdminStore } from './InMemoryAdminStore';

export interface AdminRegistryDependencies {
  permanentAdmins?: readonly string[];
  store?: IAdminStore;
  logger?: Logger;
}

export type AdminChangeFailure = 'invalid' | 'permanent' | 'exists' | 'absent';

export interface AdminChangeResult {
  success: boolean;
  message: string;
  /** Set when success is false */
  reason?: AdminChangeFailure;
}

export interface AdminList {
  permanent: string[];
  dynamic: string[];
}

export class AdminRegistry {
  private static instance: AdminRegistry | null = null;

  private readonly permanent: ReadonlySet<string>;
  private readonly store: IAdminStore;
  private readonly log: Logger;

  constructor(deps?: AdminRegistryDependencies) {
    const permanent = deps?.permanentAdmins ?? env.PERMANENT_ADMIN_HANDLES;
    this.permanent = new Set(permanent.map(normalizeUserHandle).filter(Boolean));
    this.store = deps?.store ?? new InMemoryAdminStore();
    this.log = deps?.logger ?? createChildLogger({ service: 'AdminRegistry' });

    if (this.permanent.size === 0) {
      this.log.warn('No permanent admins configured; only dynamically added admins can operate the relay');
    }
  }

  public static getInstance(deps?: AdminRegistryDependencies): AdminRegistry {
    if (!AdminRegistry.instance) {
      AdminRegistry.instance = new AdminRegistry(deps);
    }
    return AdminRegistry.instance;
  }

  public static resetInstance(): void {
    AdminRegistry.instance = null;
  }

  isPermanentAdmin(handle: string): boolean {
    return this.permanent.has(normalizeUserHandle(handle));
  }

  async isAdmin(handle: string): Promise<boolean> {
    const normalized = normalizeUserHandle(handle);
    if (!normalized) {
      return false;
    }
    return this.permanent.has(normalized) || (await this.store.has(normalized));
  }

  async addAdmin(handle: string): Promise<AdminChangeResult> {
    const normalized = normalizeUserHandle(handle);

    if (!normalized) {
      return { success: false, message: 'Invalid user handle.', reason: 'invalid' };
    }
    if (this.permanent.has(normalized)) {
      return { success: false, message: 'User is already a permanent admin.', reason: 'permanent' };
    }
    if (!(await this.store.add(normalized))) {
      return { success: false, message: 'User is already an admin.', reason: 'exists' };
    }

    this.log.info({ handle: normalized }, 'Admin added');
    return { success: true, message: `User ${normalized} added as admin.` };
  }

  async removeAdmin(handle: string): Promise<AdminChangeResult> {
    const normalized = normalizeUserHandle(handle);

    if (!normalized) {
      return { success: false, message: 'Invalid user handle.', reason: 'invalid' };
    }
    if (this.permanent.has(normalized)) {
      return { success: false, message: 'Cannot remove permanent admins.', reason: 'permanent' };
    }
    if (!(await this.store.remove(normalized))) {
      return { success: false, message: 'User is not a dynamic admin.', reason: 'absent' };
    }

    this.log.info({ handle: normalized }, 'Admin removed');
    return { success: true, message: `User ${normalized} removed from admins.` };
  }

  async listAdmins(): Promise<AdminList> {
    return {
      permanent: [...this.permanent],
      dynamic: await this.store.list(),
    };
  }
}

export function getAdminRegistry(deps?: AdminRegistryDependencies): AdminRegistry {
  return AdminRegistry.getInstance(deps);
}

export function __resetAdminRegistry(): void {
  AdminRegistry.resetInstance();
}
