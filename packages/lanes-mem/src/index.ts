export { MemoryConnector } from './link.js';
export { resolveConditions, type LinkConditions } from './conditions.js';
