export { createTenantDirectoryRoutes, type TenantDirectoryRouteOptions } from './directory.js';
export { createTenantManagementRoutes, type TenantManagementRouteOptions } from './management.js';
