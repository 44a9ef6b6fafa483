export { PermissionStore, Role, ROLES, isRole } from './permission.service';
export type { PendingAdmin, PermissionStoreOptions } from './permission.service';
export { PermissionController } from './permission.controller';
export { createPermissionRoutes } from './permission.routes';
