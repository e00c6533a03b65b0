/**
 * Database module public API exports.
 */

export { DatabaseModule } from './DatabaseModule.js';
export type { IDatabaseModuleDependencies } from './DatabaseModule.js';
export { DatabaseService } from './services/database.service.js';
