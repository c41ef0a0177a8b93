/**
 * City Registry
 * Immutable country → city → bounding box lookup, loaded once at startup
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { isValidBoundingBox, type CityBounds, type Country } from '@osm-houses/shared';
import { HarvesterErrors } from '../errors.js';

export const DEFAULT_COUNTRIES_PATH = fileURLToPath(
  new URL('../../data/countries.json', import.meta.url)
);

const cityBoundsSchema = z
  .object({
    name: z.string().min(1),
    south: z.number(),
    north: z.number(),
    west: z.number(),
    east: z.number(),
  })
  .refine(isValidBoundingBox, {
    message: 'bounding box must satisfy south < north and west < east within valid ranges',
  });

const countriesSchema = z.record(
  z.object({
    name: z.string().min(1),
    cities: z.record(cityBoundsSchema),
  })
);

export type CountryTable = z.infer<typeof countriesSchema>;

export class CityRegistry {
  private countries: Map<string, Country> = new Map();

  constructor(table: CountryTable) {
    for (const [countryKey, entry] of Object.entries(table)) {
      const cities: Record<string, CityBounds> = {};
      for (const [cityKey, city] of Object.entries(entry.cities)) {
        cities[cityKey.toLowerCase()] = Object.freeze({ key: cityKey.toLowerCase(), ...city });
      }
      this.countries.set(
        countryKey.toLowerCase(),
        Object.freeze({
          key: countryKey.toLowerCase(),
          name: entry.name,
          cities: Object.freeze(cities),
        })
      );
    }
  }

  /**
   * Get a country by key (case-insensitive)
   */
  getCountry(key: string): Country | undefined {
    return this.countries.get(key.trim().toLowerCase());
  }

  /**
   * Get a city of a country by key (case-insensitive)
   */
  getCity(countryKey: string, cityKey: string): CityBounds | undefined {
    return this.getCountry(countryKey)?.cities[cityKey.trim().toLowerCase()];
  }

  /**
   * Countries ordered by key, as the menu numbers them
   */
  listCountries(): Country[] {
    return Array.from(this.countries.values()).sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * Cities of a country ordered by key; empty for an unknown country
   */
  listCities(countryKey: string): CityBounds[] {
    const country = this.getCountry(countryKey);
    if (!country) {
      return [];
    }
    return Object.values(country.cities).sort((a, b) => a.key.localeCompare(b.key));
  }

  get size(): number {
    return this.countries.size;
  }
}

/**
 * Parse and validate a raw country table
 */
export function createCityRegistry(raw: unknown, source: string = 'inline'): CityRegistry {
  const parsed = countriesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw HarvesterErrors.invalidCityTable(source, `${where}${issue?.message ?? 'unknown error'}`);
  }
  return new CityRegistry(parsed.data);
}

/**
 * Read the country table from disk (defaults to data/countries.json)
 */
export function loadCountries(path: string = DEFAULT_COUNTRIES_PATH): CityRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw HarvesterErrors.invalidCityTable(
      path,
      error instanceof Error ? error.message : String(error)
    );
  }
  return createCityRegistry(raw, path);
}

