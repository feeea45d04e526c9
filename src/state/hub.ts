/**
 * State Hub
 * Shared in-memory state of peer availability, plus bounded event and control logs.
 * Records attributed control intents without executing them. Every read returns
 * a deep copy; mutations happen synchronously within a single call.
 * Listeners see each appended event in order; a throwing listener is logged
 * and skipped.
 */

import { HubEventListener, IStateHub } from '../interfaces/IStateHub';
import {
  ControlLogEntry,
  HubEvent,
  HubSnapshot,
  JsonObject,
  JsonValue,
  PeerAvailability,
  PeerState
} from '../types/core';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const DEFAULT_EVENT_LOG_CAP = 500;
export const DEFAULT_CONTROL_LOG_CAP = 1000;

export interface StateHubOptions {
  eventLogCap?: number;
  controlLogCap?: number;
  clock?: () => number;
}

function requireCap(setting: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(setting, `must be a positive integer, got ${value}`);
  }
  return value;
}

export class StateHub implements IStateHub {
  private readonly peers = new Map<string, PeerState>();
  private events: HubEvent[] = [];
  private controlLog: ControlLogEntry[] = [];
  private divergence = false;
  private lastUpdated: number | null = null;
  private listeners: HubEventListener[] = [];

  private readonly eventLogCap: number;
  private readonly controlLogCap: number;
  private readonly clock: () => number;

  constructor(options: StateHubOptions = {}) {
    this.eventLogCap = requireCap('eventLogCap', options.eventLogCap ?? DEFAULT_EVENT_LOG_CAP);
    this.controlLogCap = requireCap('controlLogCap', options.controlLogCap ?? DEFAULT_CONTROL_LOG_CAP);
    this.clock = options.clock ?? Date.now;
  }

  snapshot(): HubSnapshot {
    const peers: Record<string, PeerState> = {};
    for (const [coreName, state] of this.peers) {
      peers[coreName] = structuredClone(state);
    }
    return {
      timestamp: this.lastUpdated,
      peers,
      events: structuredClone(this.events),
      divergence: this.divergence
    };
  }

  updatePeerAvailability(
    coreName: string,
    availability: PeerAvailability,
    lastAssertion?: JsonObject
  ): void {
    const existing = this.peers.get(coreName);
    this.touchPeer(coreName, {
      availability,
      lastAssertion: lastAssertion ? structuredClone(lastAssertion) : existing?.lastAssertion ?? null
    });
  }

  recordAssertion(coreName: string, assertion: JsonObject): void {
    const existing = this.peers.get(coreName);
    this.touchPeer(coreName, {
      availability: existing?.availability ?? PeerAvailability.AVAILABLE,
      lastAssertion: structuredClone(assertion)
    });
  }

  recordEvent(type: string, fields: Record<string, JsonValue> = {}): HubEvent {
    const provided = fields.timestamp;
    const event: HubEvent = {
      ...structuredClone(fields),
      type,
      timestamp: typeof provided === 'number' ? provided : this.clock()
    };
    this.appendEvent(event);
    return structuredClone(event);
  }

  eventsSince(timestamp: number): HubEvent[] {
    return this.events.filter((event) => event.timestamp > timestamp).map((event) => structuredClone(event));
  }

  recordControlAction(actionPayload: JsonObject): ControlLogEntry {
    const payload = structuredClone(actionPayload);
    const provided = payload.timestamp;
    const timestamp = typeof provided === 'number' ? provided : this.clock();
    if (provided === undefined) {
      payload.timestamp = timestamp;
    }

    const entry: ControlLogEntry = { actionPayload: payload, timestamp };
    this.controlLog.push(entry);
    if (this.controlLog.length > this.controlLogCap) {
      this.controlLog = this.controlLog.slice(-this.controlLogCap);
    }

    this.appendEvent({ ...structuredClone(payload), type: 'control', timestamp });
    return structuredClone(entry);
  }

  getControlLog(): ControlLogEntry[] {
    return structuredClone(this.controlLog);
  }

  setDivergence(flag: boolean): void {
    this.divergence = flag;
  }

  addEventListener(listener: HubEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  private touchPeer(
    coreName: string,
    update: Pick<PeerState, 'availability' | 'lastAssertion'>
  ): void {
    const now = this.clock();
    const previousSeen = this.peers.get(coreName)?.lastSeen ?? now;
    this.peers.set(coreName, {
      coreName,
      availability: update.availability,
      lastAssertion: update.lastAssertion,
      lastSeen: Math.max(previousSeen, now)
    });
    this.lastUpdated = this.lastUpdated === null ? now : Math.max(this.lastUpdated, now);
  }

  private appendEvent(event: HubEvent): void {
    this.events.push(event);
    if (this.events.length > this.eventLogCap) {
      this.events = this.events.slice(-this.eventLogCap);
    }
    this.notify(event);
  }

  private notify(event: HubEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(structuredClone(event));
      } catch (error) {
        logger.warn('Hub event listener failed', { component: 'StateHub' }, errorMessage(error));
      }
    }
  }
}
