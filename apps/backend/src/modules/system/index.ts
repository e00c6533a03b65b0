export { SystemHealthService } from './system-health.service.js';
export type { DependencyStatus, HealthReport, SystemHealthDependencies } from './system-health.service.js';
export { SystemHealthController } from './system-health.controller.js';
