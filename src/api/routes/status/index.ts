/**
 * Status Routes Module
 */

export { createStatusRouter, type StatusRouterOptions } from './status.routes.js';
export { createStatusController, freshCacheTestKey, type StatusController } from './status.controller.js';
export * from './status.types.js';
