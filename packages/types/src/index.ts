/**
 * Shared type contracts for the Keepsake backend.
 *
 * Type-only package: consumers import with `import type`.
 */

export type * from './assets/index.js';
export type * from './database/index.js';
export type * from './logging/index.js';
export type * from './module/index.js';
export type * from './music/index.js';
export type * from './pages/index.js';
