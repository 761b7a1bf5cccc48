// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Resource identifier. Engine ids are caller-supplied and scope every
 * call on the surface to one tenant.
 */
export type Id = string;

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object.
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * The opaque configuration document an engine is created from.
 *
 * Each component reads only the keys it understands; everything else is
 * carried along untouched.
 */
export type ParameterTree = Record<string, unknown>;
