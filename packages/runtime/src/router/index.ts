export { EngineRouter, type EngineRouterOptions, type InputResult } from './router.js';
