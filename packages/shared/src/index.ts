// Re-export all shared types
export * from './types/oauth.js';
export * from './types/tenant.js';
export * from './types/client.js';
export * from './types/user.js';
