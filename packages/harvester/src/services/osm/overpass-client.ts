// Overpass API client for residential building search
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  MISSING_TAG_VALUE,
  RESIDENTIAL_BUILDING_TYPES,
  formatOverpassBbox,
  type BoundingBox,
  type BuildingRecord,
  type OverpassElement,
} from '@osm-houses/shared';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Overpass');

export interface OverpassConfig {
  baseURL?: string;
  timeout?: number;
  userAgent?: string;
  maxRetries?: number;
  rateLimitBackoffMs?: number;
  networkBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  http?: AxiosInstance;
}

export interface OverpassStats {
  requests: number;
  errors: number;
  parseFailures: number;
}

const responseSchema = z.object({
  elements: z.array(z.unknown()),
});

const elementSchema = z.object({
  type: z.enum(['node', 'way', 'relation']),
  id: z.union([z.number(), z.string()]),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: z.record(z.string()).optional(),
});

type AttemptOutcome =
  | { kind: 'ok'; data: unknown }
  | { kind: 'rate-limited' }
  | { kind: 'network'; message: string }
  | { kind: 'unexpected'; message: string };

/**
 * Build the address line from the addr:* tags, skipping absent parts
 */
export function buildAddress(tags: Record<string, string>): string {
  return [tags['addr:street'], tags['addr:housenumber'], tags['addr:postcode'], tags['addr:city']]
    .filter((part): part is string => Boolean(part))
    .join(', ');
}

/**
 * Turn one Overpass element into a building record.
 * Returns null for elements that are not addressable buildings; throws on malformed ones.
 */
export function toBuildingRecord(raw: unknown): BuildingRecord | null {
  const element: OverpassElement = elementSchema.parse(raw);
  const tags = element.tags ?? {};

  if (!tags['addr:housenumber'] || !tags['addr:street']) {
    return null;
  }

  let latitude: number;
  let longitude: number;
  if (element.type === 'node') {
    if (element.lat === undefined || element.lon === undefined) {
      throw new Error(`node ${element.id} has no coordinates`);
    }
    latitude = element.lat;
    longitude = element.lon;
  } else if (element.center) {
    latitude = element.center.lat;
    longitude = element.center.lon;
  } else {
    return null;
  }

  return {
    address: buildAddress(tags),
    latitude,
    longitude,
    externalId: element.id,
    buildingType: tags['building'] || MISSING_TAG_VALUE,
    levels: tags['building:levels'] || MISSING_TAG_VALUE,
  };
}

export class OverpassClient {
  private client: AxiosInstance;
  private maxRetries: number;
  private rateLimitBackoffMs: number;
  private networkBackoffMs: number;
  private sleep: (ms: number) => Promise<void>;

  private requestCount = 0;
  private errorCount = 0;
  private parseFailureCount = 0;

  constructor(config: OverpassConfig = {}) {
    this.maxRetries = config.maxRetries ?? 2;
    this.rateLimitBackoffMs = config.rateLimitBackoffMs ?? 10_000;
    this.networkBackoffMs = config.networkBackoffMs ?? 3_000;
    this.sleep = config.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));

    this.client =
      config.http ??
      axios.create({
        baseURL: config.baseURL || 'https://overpass-api.de/api',
        timeout: config.timeout ?? 15_000,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': config.userAgent || 'HouseGenerator-OSM/2.0',
          Accept: 'application/json',
        },
      });
  }

  /**
   * Build Overpass QL query for addressable residential buildings in a bbox
   */
  buildQuery(box: BoundingBox, limit: number): string {
    const bbox = formatOverpassBbox(box);
    const selectors = RESIDENTIAL_BUILDING_TYPES.map(
      (type) => `  nwr["building"="${type}"]["addr:housenumber"]["addr:street"](${bbox});`
    ).join('\n');

    return `[out:json][timeout:30];\n(\n${selectors}\n);\nout center ${limit};`;
  }

  /**
   * Fetch up to `limit` residential buildings inside `box`.
   * Network failures resolve to an empty list and bump the error counter.
   */
  async fetchResidentialBuildings(box: BoundingBox, limit: number): Promise<BuildingRecord[]> {
    logger.info(`Querying residential buildings (limit=${limit})`, { bbox: formatOverpassBbox(box) });

    const data = await this.executeQuery(this.buildQuery(box, limit));
    if (data === null) {
      return [];
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Empty or malformed Overpass response');
      return [];
    }

    const buildings: BuildingRecord[] = [];
    for (const element of parsed.data.elements) {
      try {
        const record = toBuildingRecord(element);
        if (record) {
          buildings.push(record);
        }
      } catch (error) {
        this.parseFailureCount++;
        logger.debug(
          `Skipping malformed element: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    logger.info(`Found ${buildings.length} residential buildings`);
    return buildings;
  }

  /**
   * Execute Overpass query with bounded retries
   */
  async executeQuery(query: string): Promise<unknown> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const outcome = await this.attempt(query);

      if (outcome.kind === 'ok') {
        return outcome.data;
      }

      const isLastAttempt = attempt === this.maxRetries;

      if (outcome.kind === 'rate-limited') {
        const wait = this.rateLimitBackoffMs * attempt;
        logger.warn(`Rate limited (attempt ${attempt}/${this.maxRetries})`, { waitMs: wait });
        await this.sleep(wait);
        continue;
      }

      if (outcome.kind === 'network') {
        logger.warn(`Network error (attempt ${attempt}/${this.maxRetries}): ${outcome.message}`);
        if (!isLastAttempt) {
          await this.sleep(this.networkBackoffMs * attempt);
        }
        continue;
      }

      logger.error(`Unexpected error, giving up: ${outcome.message}`);
      break;
    }

    this.errorCount++;
    return null;
  }

  private async attempt(query: string): Promise<AttemptOutcome> {
    this.requestCount++;

    try {
      const response = await this.client.post<unknown>(
        '/interpreter',
        `data=${encodeURIComponent(query)}`
      );
      return { kind: 'ok', data: response.data };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response?.status === 429) {
          return { kind: 'rate-limited' };
        }
        return { kind: 'network', message: error.message };
      }
      return {
        kind: 'unexpected',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  getStats(): OverpassStats {
    return {
      requests: this.requestCount,
      errors: this.errorCount,
      parseFailures: this.parseFailureCount,
    };
  }
}
