/**
 * ENTROPY MODULE — Index
 */

export * from './entropy.types.js';
export * from './entropy.config.js';
export * from './entropy.stats.js';
export * from './entropy.sources.js';
export * from './entropy.mixer.js';
export * from './entropy.derived.js';
export * from './entropy.quality.js';
export * from './entropy.coordinator.js';
export * from './entropy.scheduler.js';
export { registerEntropyRoutes } from './entropy.routes.js';
