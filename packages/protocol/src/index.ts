// @enginehost/protocol
// Types, schemas and wire helpers shared by every engine host package.

export * from './types/index.js';
export * from './validation/index.js';
export {
  parseNdjson,
  stringifyNdjsonLine,
  toMirrorLine,
  fromMirrorLine,
  mirrorLineSchema,
  type MirrorLine,
  type NdjsonLog,
  type TornLine,
} from './mirror/ndjson.js';
