export { createHealthRoutes } from './health.routes';
export { createOverviewRoutes } from './overview.routes';
export { createSessionRoutes } from './session.routes';
