export type { IStorageProvider } from './IStorageProvider.js';
