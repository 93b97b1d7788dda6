/**
 * Registry events and the sinks that receive them
 */

import { logger } from "./logs.js";

export type RegistryEvent =
  | { type: "registry.init"; recordType: string; records: number; keys: string[] }
  | { type: "record.append"; recordType: string; index: number; size: number }
  | { type: "record.replace"; recordType: string; index: number }
  | { type: "record.delete"; recordType: string; index: number; size: number }
  | { type: "registry.clear"; recordType: string; removed: number }
  | { type: "key.resolve"; recordType: string; key: string; value: string; index: number }
  | { type: "key.miss"; recordType: string; key?: string; value: string };

export type RegistryEventType = RegistryEvent["type"];

export interface RegistryEventSink {
  emit(event: RegistryEvent): void;
}

/**
 * Forwards every event to the global logger at debug level
 */
export const loggerSink: RegistryEventSink = {
  emit(event) {
    const { type, recordType, ...details } = event;
    logger.debug(type, {
      recordType,
      key: "key" in event ? event.key : undefined,
      details,
    });
  },
};

/**
 * Discards every event
 */
export const nullSink: RegistryEventSink = {
  emit() {},
};

/**
 * Sink that keeps every event in memory, in emission order
 */
export class RecordingSink implements RegistryEventSink {
  readonly events: RegistryEvent[] = [];

  emit(event: RegistryEvent): void {
    this.events.push(event);
  }

  /**
   * Event types received so far
   */
  types(): RegistryEventType[] {
    return this.events.map((event) => event.type);
  }

  clear(): void {
    this.events.length = 0;
  }
}
