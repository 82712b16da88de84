export { registerCors, getAllowedOriginsSet, isLocalhostOrigin } from './cors.js';
