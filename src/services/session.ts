/**
 * Session Controller
 *
 * Owns login, logout and silent renewal for one client instance. Everything
 * else reads authentication state from here or from the credential store.
 */

export * from './auth/types';
export * from './auth/core';
export * from './auth/events';
export { IdentityCache } from './auth/identityCache';
