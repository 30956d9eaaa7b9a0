export { ApiServer, type ServerConfig } from './express.js';
