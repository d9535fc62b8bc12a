/**
 * Server module exports
 */

export { ApiServer, SERVICE_NAME, type ServerConfig } from './express.js';
