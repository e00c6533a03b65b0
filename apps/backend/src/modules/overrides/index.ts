export { OverridesModule } from './OverridesModule.js';
export type { IOverridesModuleDependencies } from './OverridesModule.js';
export { SlugOverrideService } from './services/slug-override.service.js';
export { createSlugOverrideMiddleware } from './api/slug-override.middleware.js';
