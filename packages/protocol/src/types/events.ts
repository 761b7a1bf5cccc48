// Event types - the raw input every engine consumes

import type { Id, JsonValue, Timestamp } from './common.js';

/**
 * An input event as accepted by the router.
 * Immutable once accepted.
 */
export type Event = {
  entityType: string;
  entityId: string;
  /** Event name, e.g. "purchase" or a reserved name such as "$set" */
  event: string;
  targetEntityType?: string;
  targetEntityId?: string;
  properties: Record<string, JsonValue>;
  /** When the event happened, as reported by the caller (defaults to acceptance time) */
  eventTime: Timestamp;
  /** When the event was accepted */
  creationTime: Timestamp;
};

/**
 * An event as submitted by a caller, before acceptance.
 */
export type EventInput = {
  entityType: string;
  entityId: string;
  event: string;
  targetEntityType?: string;
  targetEntityId?: string;
  properties?: Record<string, JsonValue>;
  eventTime?: Timestamp;
};

/**
 * Event names that mutate model state directly instead of feeding the dataset.
 */
export const RESERVED_EVENTS = ['$set', '$unset', '$delete'] as const;

export type ReservedEventName = (typeof RESERVED_EVENTS)[number];

export function isReservedEvent(name: string): name is ReservedEventName {
  return RESERVED_EVENTS.some((reserved) => reserved === name);
}

/**
 * One entry in an engine's mirror log.
 * Sequence numbers start at 1 and are gapless per engine under normal operation.
 */
export type MirrorRecord = {
  engineId: Id;
  sequence: number;
  eventTime: Timestamp;
  creationTime: Timestamp;
  event: Event;
};
