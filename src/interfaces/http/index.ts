export { default as orderRoutes } from './order-routes.js';
export type { OrderRoutesOptions } from './order-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions, PipelineStatus } from './health-routes.js';
