/**
 * @groupsync/core
 *
 * Membership types, gateway interfaces and errors shared by every package
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
