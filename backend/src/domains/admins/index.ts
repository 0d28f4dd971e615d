/**
 * Admins Domain
 *
 * @module domains/admins
 */

export { AdminRegistry, getAdminRegistry, __resetAdminRegistry } from './AdminRegistry';
export type { AdminRegistryDependencies, AdminChangeResult, AdminChangeFailure, AdminList } from './AdminRegistry';
export type { IAdminStore } from './IAdminStore';
export { InMemoryAdminStore } from './InMemoryAdminStore';
