export { MusicModule } from './MusicModule.js';
export type { IMusicModuleDependencies } from './MusicModule.js';
export { MusicLookupClient, clampLimit } from './services/music-lookup.client.js';
export { MusicController } from './api/music.controller.js';
