export { setupRoutes, type AdminDependencies } from './routes.js';
export { AdminServer, type AdminServerConfig } from './server.js';
