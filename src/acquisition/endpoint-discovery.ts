/**
 * Endpoint Discovery
 * Resolves the list of peer endpoints from configuration sources in priority order:
 *   1) PEER_VERDICT_ENDPOINTS (inline JSON array)
 *   2) PEER_VERDICT_ENDPOINTS_FILE (path to a JSON file)
 *   3) softmax_core4_endpoints.json under the base directory, then <base>/config
 *   4) the built-in default endpoint
 * A source that is missing, malformed or empty falls through to the next one.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  DiscoveredEndpoints,
  EndpointDescriptor,
  HttpMethod,
  JsonValue
} from '../types/core';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { isJsonObject, parseJson } from '../utils/json';

export const ENDPOINTS_ENV = 'PEER_VERDICT_ENDPOINTS';
export const ENDPOINTS_FILE_ENV = 'PEER_VERDICT_ENDPOINTS_FILE';
export const DEFAULT_ENDPOINT_ENV = 'DEFAULT_PEER_ENDPOINT';
export const CONVENTIONAL_FILENAME = 'softmax_core4_endpoints.json';

export const DEFAULT_CORE_NAME = 'UCM_Core_ECM';
export const DEFAULT_ENDPOINT_URL = 'http://localhost:8002/api/adjudicate';
export const DEFAULT_PAYLOAD_KEY = 'query';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH'];

export interface EndpointDiscoveryOptions {
  baseDir: string;
  env?: NodeJS.ProcessEnv;
}

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

function readString(item: Record<string, JsonValue>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Parse a descriptor list; invalid items are skipped with a warning
 */
export function parseEndpointList(data: JsonValue): EndpointDescriptor[] {
  if (!Array.isArray(data)) {
    logger.warn('Endpoint config must be a list', { component: 'EndpointDiscovery' }, typeof data);
    return [];
  }

  const endpoints: EndpointDescriptor[] = [];
  for (const item of data) {
    if (!isJsonObject(item)) {
      logger.warn('Skipping endpoint config that is not an object', { component: 'EndpointDiscovery' }, item);
      continue;
    }

    const coreName = readString(item, 'core_name', 'coreName');
    const url = readString(item, 'url');
    if (!coreName || !url) {
      logger.warn('Skipping endpoint config without core_name or url', { component: 'EndpointDiscovery' }, item);
      continue;
    }

    const method = (readString(item, 'method') ?? 'POST').toUpperCase();
    if (!isHttpMethod(method)) {
      logger.warn(`Skipping endpoint config with unsupported method ${method}`, {
        component: 'EndpointDiscovery',
        peer: coreName
      });
      continue;
    }

    endpoints.push({
      coreName,
      url,
      method,
      payloadKey: readString(item, 'payload_key', 'payloadKey') ?? DEFAULT_PAYLOAD_KEY
    });
  }

  return endpoints;
}

export class EndpointDiscovery {
  private readonly baseDir: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EndpointDiscoveryOptions) {
    this.baseDir = options.baseDir;
    this.env = options.env ?? process.env;
  }

  /**
   * Candidate locations of the conventional endpoints file
   */
  getConventionalPaths(): string[] {
    return [
      path.join(this.baseDir, CONVENTIONAL_FILENAME),
      path.join(this.baseDir, 'config', CONVENTIONAL_FILENAME)
    ];
  }

  async discover(): Promise<DiscoveredEndpoints> {
    const inline = this.env[ENDPOINTS_ENV];
    if (inline) {
      try {
        const endpoints = parseEndpointList(parseJson(inline));
        if (endpoints.length > 0) {
          return { source: 'inline', endpoints };
        }
      } catch (error) {
        logger.warn(`Invalid ${ENDPOINTS_ENV} JSON`, { component: 'EndpointDiscovery' }, errorMessage(error));
      }
    }

    const filePath = this.env[ENDPOINTS_FILE_ENV];
    if (filePath) {
      const endpoints = await this.readEndpointFile(filePath);
      if (endpoints.length > 0) {
        return { source: 'file', endpoints };
      }
    }

    for (const candidate of this.getConventionalPaths()) {
      const endpoints = await this.readEndpointFile(candidate);
      if (endpoints.length > 0) {
        return { source: 'conventional', endpoints };
      }
    }

    return {
      source: 'default',
      endpoints: [
        {
          coreName: DEFAULT_CORE_NAME,
          url: this.env[DEFAULT_ENDPOINT_ENV] || DEFAULT_ENDPOINT_URL,
          method: 'POST',
          payloadKey: DEFAULT_PAYLOAD_KEY
        }
      ]
    };
  }

  private async readEndpointFile(filePath: string): Promise<EndpointDescriptor[]> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      logger.debug(`Endpoint config not readable: ${filePath}`, { component: 'EndpointDiscovery' }, errorMessage(error));
      return [];
    }

    try {
      return parseEndpointList(parseJson(raw));
    } catch (error) {
      logger.warn(`Failed to parse endpoint config ${filePath}`, { component: 'EndpointDiscovery' }, errorMessage(error));
      return [];
    }
  }
}
