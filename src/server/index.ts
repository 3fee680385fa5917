export { ApiServer } from './express.js';
export type { ApiServerDeps } from './express.js';
