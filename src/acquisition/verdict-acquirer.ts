/**
 * Verdict Acquirer
 * Distributes a decision context to every discovered peer in parallel, each call
 * bounded by its own timeout, and extracts verdicts from the usable responses.
 * Peers that fail, time out or answer without a usable payload are omitted;
 * no verdict is ever synthesized for them.
 */

import { IVerdictAcquirer } from '../interfaces/IVerdictAcquirer';
import { IShapeGuide } from '../interfaces/IShapeGuide';
import {
  AcquisitionOutcome,
  AcquisitionOutcomeKind,
  AcquisitionResult,
  DiscoveredEndpoints,
  EndpointDescriptor,
  JsonValue,
  Verdict
} from '../types/core';
import { ShapeGuide } from './shape-guide';
import { extractVerdict } from './extraction-rules';
import { logger } from '../utils/logger';
import { PeerErrorCode, PeerRequestError, errorMessage } from '../utils/errors';
import { isJsonObject, parseJson } from '../utils/json';
import { acquisitionDuration, updatePeerOutcome } from '../monitoring/metrics';

export const MIN_TIMEOUT_MS = 100;
export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Anything that can produce the endpoint list for a cycle
 */
export interface EndpointSourceProvider {
  discover(): Promise<DiscoveredEndpoints>;
}

export interface VerdictAcquirerOptions {
  discovery: EndpointSourceProvider;
  shapeGuide?: IShapeGuide;
  defaultTimeoutMs?: number;
}

const OUTCOME_BY_ERROR_CODE: Record<PeerErrorCode, AcquisitionOutcomeKind> = {
  TIMEOUT: 'timeout',
  NETWORK_ERROR: 'unreachable',
  HTTP_ERROR: 'http_error',
  EMPTY_BODY: 'no_usable_payload',
  INVALID_JSON: 'no_usable_payload'
};

export class VerdictAcquirer implements IVerdictAcquirer {
  private readonly discovery: EndpointSourceProvider;
  private readonly shapeGuide: IShapeGuide;
  private readonly defaultTimeoutMs: number;

  constructor(options: VerdictAcquirerOptions) {
    this.discovery = options.discovery;
    this.shapeGuide = options.shapeGuide ?? new ShapeGuide();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async collect(decisionContext: string, timeoutMs?: number): Promise<Verdict[]> {
    const result = await this.collectDetailed(decisionContext, timeoutMs);
    return result.verdicts;
  }

  async collectDetailed(decisionContext: string, timeoutMs?: number): Promise<AcquisitionResult> {
    const startTime = Date.now();
    const effectiveTimeout = Math.max(MIN_TIMEOUT_MS, timeoutMs ?? this.defaultTimeoutMs);

    let discovered: DiscoveredEndpoints;
    try {
      discovered = await this.discovery.discover();
    } catch (error) {
      logger.error('Endpoint discovery failed', { decisionContext, component: 'Acquirer' }, errorMessage(error));
      return { verdicts: [], outcomes: [] };
    }

    const endpoints = discovered.endpoints;
    logger.acquisitionStart(decisionContext, endpoints.length, discovered.source);

    // Every request runs concurrently; stragglers are dropped by their own timeout
    const results = await Promise.allSettled(
      endpoints.map((endpoint) => this.acquireFromEndpoint(endpoint, decisionContext, effectiveTimeout))
    );

    const outcomes: AcquisitionOutcome[] = [];
    const verdicts: Verdict[] = [];

    for (let i = 0; i < results.length; i++) {
      const result = results[i];
      const endpoint = endpoints[i];

      const outcome: AcquisitionOutcome =
        result.status === 'fulfilled'
          ? result.value
          : {
            coreName: endpoint.coreName,
            url: endpoint.url,
            kind: 'unreachable',
            detail: errorMessage(result.reason),
            latencyMs: Date.now() - startTime
          };

      outcomes.push(outcome);
      updatePeerOutcome(outcome.kind);
      if (outcome.verdict) {
        verdicts.push(outcome.verdict);
      }
    }

    const duration = Date.now() - startTime;
    acquisitionDuration.observe(duration / 1000);
    logger.acquisitionEnd(decisionContext, verdicts.length, endpoints.length, duration);

    return { verdicts, outcomes };
  }

  /**
   * Request one endpoint and classify the result; never rejects
   */
  private async acquireFromEndpoint(
    endpoint: EndpointDescriptor,
    decisionContext: string,
    timeoutMs: number
  ): Promise<AcquisitionOutcome> {
    const startTime = Date.now();
    const outcome = (kind: AcquisitionOutcomeKind, detail: string, verdict?: Verdict): AcquisitionOutcome => {
      const latencyMs = Date.now() - startTime;
      logger.peerOutcome(endpoint.coreName, kind, latencyMs, detail);
      return { coreName: endpoint.coreName, url: endpoint.url, kind, detail, latencyMs, verdict };
    };

    let payload: JsonValue;
    try {
      payload = await this.executeWithTimeout(
        (signal) => this.requestPeer(endpoint, decisionContext, signal),
        timeoutMs
      );
    } catch (error) {
      if (error instanceof PeerRequestError) {
        return outcome(OUTCOME_BY_ERROR_CODE[error.code], error.message);
      }
      return outcome('unreachable', `Endpoint unreachable: ${errorMessage(error)}`);
    }

    const observation = this.shapeGuide.observe(payload);
    if (!observation.conforming || !isJsonObject(payload)) {
      return outcome('non_conforming', `Assertion skipped (${observation.reason})`);
    }

    const extraction = extractVerdict(endpoint.coreName, payload);
    if (!extraction) {
      return outcome('non_conforming', 'Assertion skipped (no extraction rule located assertion and confidence)');
    }

    return outcome(
      'verdict',
      `${extraction.verdict.verdict} @ ${extraction.verdict.confidence} via ${extraction.rule}`,
      extraction.verdict
    );
  }

  /**
   * Perform the HTTP exchange and decode the JSON body
   */
  private async requestPeer(
    endpoint: EndpointDescriptor,
    decisionContext: string,
    signal: AbortSignal
  ): Promise<JsonValue> {
    const headers = {
      'Content-Type': 'application/json',
      'Accept': 'application/json'
    };

    let response: Response;
    try {
      if (endpoint.method === 'GET') {
        const url = new URL(endpoint.url);
        url.searchParams.set(endpoint.payloadKey, decisionContext);
        response = await fetch(url.toString(), { method: 'GET', headers, signal });
      } else {
        response = await fetch(endpoint.url, {
          method: endpoint.method,
          headers,
          body: JSON.stringify({ [endpoint.payloadKey]: decisionContext }),
          signal
        });
      }
    } catch (error) {
      throw new PeerRequestError('NETWORK_ERROR', `Endpoint unreachable: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new PeerRequestError(
        'HTTP_ERROR',
        `HTTP ${response.status}: ${response.statusText}`,
        response.status
      );
    }

    const raw = await response.text();
    if (raw.trim() === '') {
      throw new PeerRequestError('EMPTY_BODY', 'No usable payload: empty response body');
    }

    try {
      return parseJson(raw);
    } catch (error) {
      throw new PeerRequestError('INVALID_JSON', `No usable payload: invalid JSON (${errorMessage(error)})`);
    }
  }

  /**
   * Execute a request with timeout; the request is aborted when the timer fires
   */
  private async executeWithTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
  ): Promise<T> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new PeerRequestError('TIMEOUT', `Request timeout after ${timeoutMs}ms`));
          controller.abort();
        }, timeoutMs);
      });

      return await Promise.race([fn(controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
