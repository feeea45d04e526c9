import {
  ControlLogEntry,
  HubEvent,
  HubSnapshot,
  JsonObject,
  JsonValue,
  PeerAvailability
} from '../types/core';

export type HubEventListener = (event: HubEvent) => void;

/**
 * State Hub Interface
 * Shared live cache of peer availability plus bounded event and control logs
 */
export interface IStateHub {
  /**
   * Deep copy of the current state
   */
  snapshot(): HubSnapshot;

  updatePeerAvailability(
    coreName: string,
    availability: PeerAvailability,
    lastAssertion?: JsonObject
  ): void;

  recordAssertion(coreName: string, assertion: JsonObject): void;

  recordEvent(type: string, fields?: Record<string, JsonValue>): HubEvent;

  /**
   * Events strictly newer than the given epoch milliseconds
   */
  eventsSince(timestamp: number): HubEvent[];

  /**
   * Record an attributed control intent; never dispatches it
   */
  recordControlAction(actionPayload: JsonObject): ControlLogEntry;

  getControlLog(): ControlLogEntry[];

  setDivergence(flag: boolean): void;

  /**
   * Called with a copy of every appended event, control mirrors included
   * @returns Function that removes the listener
   */
  addEventListener(listener: HubEventListener): () => void;
}
