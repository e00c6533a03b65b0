/**
 * Pages module public API exports.
 */

export { PagesModule } from './PagesModule.js';
export type { IPagesModuleDependencies } from './PagesModule.js';
export { PageRepository } from './services/page.repository.js';
export { PageReconciler, sortTimeline } from './services/page-reconciler.service.js';
export { AccessGate } from './services/access-gate.service.js';
export { normalizeEmbedUrl, buildEmbedUrl } from './services/embed-url.js';
export type { EmbedType } from './services/embed-url.js';
export { StorageProvider } from './services/storage/StorageProvider.js';
export { LocalStorageProvider } from './services/storage/LocalStorageProvider.js';
export { RemoteAssetStoreProvider } from './services/storage/RemoteAssetStoreProvider.js';
