/**
 * House Generator
 * Picks random residential addresses in a city and saves them to the houses log
 */

import type { BuildingRecord } from '@osm-houses/shared';
import type { CityRegistry } from '../../config/countries.js';
import type { OverpassClient } from '../osm/overpass-client.js';
import type { HousesStore } from '../store/houses-store.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Generator');

// ==================== Types ====================

export type HarvestStatus =
  | 'saved'
  | 'all-rejected'
  | 'no-buildings'
  | 'unknown-country'
  | 'unknown-city';

export interface HarvestResult {
  status: HarvestStatus;
  countryName?: string;
  cityName?: string;
  requested: number;
  candidates: number;
  generated: number;
  requests: number;
  errors: number;
}

export interface HarvestProgress {
  total: number;
  saved: number;
  attempted: number;
  currentAddress?: string;
}

export type ProgressCallback = (progress: HarvestProgress) => void;

export interface HouseGeneratorOptions {
  client: Pick<OverpassClient, 'fetchResidentialBuildings' | 'getStats'>;
  store: Pick<HousesStore, 'addRecord'>;
  cities: CityRegistry;
  requestDelayMs?: number;
  random?: () => number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Fisher–Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class HouseGenerator {
  private readonly client: HouseGeneratorOptions['client'];
  private readonly store: HouseGeneratorOptions['store'];
  private readonly cities: CityRegistry;
  private readonly requestDelayMs: number;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestTime: number | null = null;

  constructor(options: HouseGeneratorOptions) {
    this.client = options.client;
    this.store = options.store;
    this.cities = options.cities;
    this.requestDelayMs = options.requestDelayMs ?? 1_100;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Rate limiting: keep at least requestDelayMs between Overpass queries
   */
  private async enforceRateLimit(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const timeSinceLastRequest = this.clock() - this.lastRequestTime;
      if (timeSinceLastRequest < this.requestDelayMs) {
        await this.sleep(this.requestDelayMs - timeSinceLastRequest);
      }
    }

    this.lastRequestTime = this.clock();
  }

  /**
   * Save up to `count` distinct houses from the given city
   */
  async generateHouses(
    countryKey: string,
    cityKey: string,
    count: number,
    onProgress?: ProgressCallback
  ): Promise<HarvestResult> {
    const result: HarvestResult = {
      status: 'no-buildings',
      requested: count,
      candidates: 0,
      generated: 0,
      requests: 0,
      errors: 0,
    };

    const country = this.cities.getCountry(countryKey);
    if (!country) {
      logger.error(`Country '${countryKey}' not found`);
      return { ...result, status: 'unknown-country' };
    }

    const city = this.cities.getCity(countryKey, cityKey);
    if (!city) {
      logger.error(`City '${cityKey}' not found in ${country.name}`);
      return { ...result, status: 'unknown-city', countryName: country.name };
    }

    result.countryName = country.name;
    result.cityName = city.name;
    logger.info(`Requested ${count} houses for ${city.name}`);

    await this.enforceRateLimit();
    const buildings = await this.client.fetchResidentialBuildings(city, count * 2);
    result.candidates = buildings.length;

    if (buildings.length > 0) {
      result.generated = this.saveBuildings(
        country.name,
        city.name,
        shuffle(buildings, this.random),
        count,
        onProgress
      );
      result.status = result.generated > 0 ? 'saved' : 'all-rejected';
    }

    const stats = this.client.getStats();
    result.requests = stats.requests;
    result.errors = stats.errors;

    logger.info(`Generation finished: ${result.generated} houses`, { status: result.status });
    return result;
  }

  private saveBuildings(
    countryName: string,
    cityName: string,
    buildings: BuildingRecord[],
    count: number,
    onProgress?: ProgressCallback
  ): number {
    const progress: HarvestProgress = {
      total: Math.min(count, buildings.length),
      saved: 0,
      attempted: 0,
    };

    for (const building of buildings) {
      if (progress.saved >= count) {
        break;
      }
      if (!building.address) {
        continue;
      }

      progress.attempted++;
      progress.currentAddress = building.address;
      if (this.store.addRecord(countryName, cityName, building)) {
        progress.saved++;
      }

      if (onProgress) {
        onProgress({ ...progress });
      }
    }

    return progress.saved;
  }
}
