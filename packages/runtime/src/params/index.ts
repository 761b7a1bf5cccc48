export { parseParameterTree, parseAndValidate, extractSection, parseEngineParams } from './store.js';
