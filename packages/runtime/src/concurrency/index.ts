export { KeyedMutex, SerialQueue } from './keyed-mutex.js';
