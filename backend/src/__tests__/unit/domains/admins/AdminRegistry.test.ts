/**
 * AdminRegistry Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AdminRegistry,
  InMemoryAdminStore,
  __resetAdminRegistry,
  getAdminRegistry,
} from '@/domains/admins';

vi.mock('@/shared/utils/logger', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

describe('AdminRegistry', () => {
  let registry: AdminRegistry;

  beforeEach(() => {
    registry = new AdminRegistry({
      permanentAdmins: ['owner', '@ops', '42'],
      store: new InMemoryAdminStore(),
    });
  });

  afterEach(() => {
    __resetAdminRegistry();
  });

  describe('isAdmin', () => {
    it('accepts permanent admins with or without the @', async () => {
      expect(await registry.isAdmin('@owner')).toBe(true);
      expect(await registry.isAdmin('ops')).toBe(true);
      expect(await registry.isAdmin('42')).toBe(true);
    });

    it('rejects unknown and blank handles', async () => {
      expect(await registry.isAdmin('@stranger')).toBe(false);
      expect(await registry.isAdmin('   ')).toBe(false);
    });

    it('accepts dynamic admins once added', async () => {
      await registry.addAdmin('alice');
      expect(await registry.isAdmin('@alice')).toBe(true);
    });
  });

  describe('addAdmin', () => {
    it('adds a new dynamic admin', async () => {
      expect(await registry.addAdmin(' alice ')).toEqual({
        success: true,
        message: 'User @alice added as admin.',
      });
    });

    it('refuses duplicates', async () => {
      await registry.addAdmin('@alice');
      expect(await registry.addAdmin('alice')).toEqual({
        success: false,
        message: 'User is already an admin.',
        reason: 'exists',
      });
    });

    it('refuses permanent admins', async () => {
      expect(await registry.addAdmin('@owner')).toEqual({
        success: false,
        message: 'User is already a permanent admin.',
        reason: 'permanent',
      });
    });

    it('refuses blank handles', async () => {
      expect(await registry.addAdmin('')).toEqual({
        success: false,
        message: 'Invalid user handle.',
        reason: 'invalid',
      });
    });
  });

  describe('removeAdmin', () => {
    it('removes a dynamic admin', async () => {
      await registry.addAdmin('@alice');

      expect(await registry.removeAdmin('alice')).toEqual({
        success: true,
        message: 'User @alice removed from admins.',
      });
      expect(await registry.isAdmin('@alice')).toBe(false);
    });

    it('never removes permanent admins', async () => {
      expect(await registry.removeAdmin('owner')).toEqual({
        success: false,
        message: 'Cannot remove permanent admins.',
        reason: 'permanent',
      });
      expect(await registry.isAdmin('@owner')).toBe(true);
    });

    it('reports handles that are not dynamic admins', async () => {
      expect(await registry.removeAdmin('@bob')).toEqual({
        success: false,
        message: 'User is not a dynamic admin.',
        reason: 'absent',
      });
    });
  });

  it('lists permanent and dynamic admins separately', async () => {
    await registry.addAdmin('carol');

    expect(await registry.listAdmins()).toEqual({
      permanent: ['@owner', '@ops', '42'],
      dynamic: ['@carol'],
    });
  });

  it('reports permanence synchronously', () => {
    expect(registry.isPermanentAdmin('owner')).toBe(true);
    expect(registry.isPermanentAdmin('@carol')).toBe(false);
  });

  describe('singleton', () => {
    it('defaults the permanent list to configuration', async () => {
      const shared = getAdminRegistry();

      expect(getAdminRegistry()).toBe(shared);
      expect(await shared.isAdmin('@owner')).toBe(true);
    });
  });
});
