/**
 * Sessions
 *
 * Keyed, lifecycle-managed conversation state
 */

export * from './types.js';
export * from './session.js';
export * from './manager.js';
export * from './storage.js';
