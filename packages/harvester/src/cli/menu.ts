/**
 * Interactive two-level menu: country, then city, then how many houses
 */

import { createInterface } from 'node:readline/promises';
import type { Country } from '@osm-houses/shared';
import type { CityRegistry } from '../config/countries.js';
import type { HarvestProgress, HarvestResult, HouseGenerator } from '../services/harvest/generator.js';
import type { HousesStore } from '../services/store/houses-store.js';

export const DEFAULT_COUNT = 10;
export const MIN_COUNT = 1;
export const MAX_COUNT = 100;

const EXIT_COMMANDS = new Set(['0', 'exit', 'quit', 'q']);
const BACK_COMMANDS = new Set(['0', 'back']);
const RULE = '='.repeat(70);

export interface MenuIO {
  /** Resolves to null once input has ended */
  ask(question: string): Promise<string | null>;
  print(line?: string): void;
}

export interface MenuOptions {
  generator: Pick<HouseGenerator, 'generateHouses'>;
  store: Pick<HousesStore, 'getStats' | 'absolutePath'>;
  cities: CityRegistry;
  io: MenuIO;
}

export interface ParsedCount {
  count: number;
  warning?: string;
}

/**
 * Empty or non-numeric input falls back to the default; out-of-range input is reset to it
 */
export function parseCount(input: string): ParsedCount {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { count: DEFAULT_COUNT };
  }
  if (!/^[-+]?\d+$/.test(trimmed)) {
    return { count: DEFAULT_COUNT };
  }

  const count = parseInt(trimmed, 10);
  if (count < MIN_COUNT || count > MAX_COUNT) {
    return { count: DEFAULT_COUNT, warning: `⚠️ Range: ${MIN_COUNT}-${MAX_COUNT}` };
  }
  return { count };
}

/**
 * 1-based numeric pick from a list
 */
export function pickByNumber<T>(items: readonly T[], choice: string): T | undefined {
  if (!/^\d+$/.test(choice)) {
    return undefined;
  }
  const index = parseInt(choice, 10) - 1;
  return index >= 0 && index < items.length ? items[index] : undefined;
}

export function formatProgress(progress: HarvestProgress): string {
  const address = progress.currentAddress ? ` · ${progress.currentAddress.slice(0, 50)}` : '';
  return `  Saved ${progress.saved}/${progress.total}${address}`;
}

export function describeResult(result: HarvestResult, filePath: string): string[] {
  const lines = [`\n📊 Requests: ${result.requests} (errors: ${result.errors})`];

  switch (result.status) {
    case 'saved':
      lines.push(`\n✅ Saved ${result.generated} residential houses`);
      lines.push(`📂 File: ${filePath}`);
      break;
    case 'all-rejected':
      lines.push('\n❌ No houses saved (all duplicates or empty)');
      break;
    case 'no-buildings':
      lines.push(`\n❌ No residential houses with addresses found in ${result.cityName}`);
      break;
    case 'unknown-country':
      lines.push('\n❌ Unknown country');
      break;
    case 'unknown-city':
      lines.push(`\n❌ Unknown city in ${result.countryName}`);
      break;
  }

  return lines;
}

export class HarvesterMenu {
  private readonly generator: MenuOptions['generator'];
  private readonly store: MenuOptions['store'];
  private readonly cities: CityRegistry;
  private readonly io: MenuIO;

  constructor(options: MenuOptions) {
    this.generator = options.generator;
    this.store = options.store;
    this.cities = options.cities;
    this.io = options.io;
  }

  displayCountries(): void {
    this.io.print(`\n${RULE}`);
    this.io.print('🌍 AVAILABLE COUNTRIES:');
    this.io.print(RULE);

    this.cities.listCountries().forEach((country, i) => {
      const cityCount = Object.keys(country.cities).length;
      this.io.print(`${String(i + 1).padStart(2)}. ${country.name} (${cityCount} cities)`);
    });

    this.io.print('\n 0. Exit | stats - statistics');
    this.io.print(RULE);
  }

  displayCities(country: Country): void {
    this.io.print(`\n${RULE}`);
    this.io.print(`🏙️ CITIES IN ${country.name.toUpperCase()}:`);
    this.io.print(RULE);

    this.cities.listCities(country.key).forEach((city, i) => {
      this.io.print(`${String(i + 1).padStart(2)}. ${city.name}`);
    });

    this.io.print('\n 0. Back | back - return to country selection');
    this.io.print(RULE);
  }

  showStats(): void {
    const stats = this.store.getStats();
    this.io.print(`\n${RULE}`);
    this.io.print('📊 HOUSE STATISTICS (OSM):');
    this.io.print(RULE);
    this.io.print(`🏠 Total saved: ${stats.total}`);
    this.io.print(`📄 File: ${this.store.absolutePath}`);
    this.io.print(RULE);
  }

  /**
   * Loop until the operator exits or input ends
   */
  async run(): Promise<void> {
    let currentCountry: Country | null = null;

    while (true) {
      if (!currentCountry) {
        this.displayCountries();
        const answer = await this.io.ask('\n🌍 Choose a country: ');
        if (answer === null) {
          break;
        }
        const choice = answer.trim().toLowerCase();

        if (EXIT_COMMANDS.has(choice)) {
          break;
        }

        if (choice === 'stats') {
          this.showStats();
          if ((await this.io.ask('\nPress Enter...')) === null) {
            break;
          }
          continue;
        }

        const country = pickByNumber(this.cities.listCountries(), choice);
        if (country) {
          currentCountry = country;
          continue;
        }

        this.io.print('\n❌ Invalid choice. Try again.');
      } else {
        this.displayCities(currentCountry);
        const answer = await this.io.ask(`\n🏙️ Choose a city (${currentCountry.name}): `);
        if (answer === null) {
          break;
        }
        const choice = answer.trim().toLowerCase();

        if (BACK_COMMANDS.has(choice)) {
          currentCountry = null;
          continue;
        }

        const city = pickByNumber(this.cities.listCities(currentCountry.key), choice);
        if (!city) {
          this.io.print('\n❌ Invalid choice. Try again.');
          continue;
        }

        const countAnswer = await this.io.ask(`\n🔢 How many addresses? [${DEFAULT_COUNT}]: `);
        if (countAnswer === null) {
          break;
        }
        const { count, warning } = parseCount(countAnswer);
        if (warning) {
          this.io.print(warning);
        }

        const proceed = await this.harvest(currentCountry, city.key, city.name, count);
        if (!proceed) {
          break;
        }
      }
    }

    this.io.print('\n👋 Goodbye!');
  }

  private async harvest(
    country: Country,
    cityKey: string,
    cityName: string,
    count: number
  ): Promise<boolean> {
    this.io.print(`\n${RULE}`);
    this.io.print(`🏠 SEARCHING RESIDENTIAL HOUSES IN: ${country.name} → ${cityName.toUpperCase()}`);
    this.io.print('Method: OpenStreetMap Overpass API');
    this.io.print(RULE);

    const result = await this.generator.generateHouses(country.key, cityKey, count, (progress) =>
      this.io.print(formatProgress(progress))
    );
    describeResult(result, this.store.absolutePath).forEach((line) => this.io.print(line));

    if (result.status !== 'saved') {
      this.io.print('\n❌ Search had problems. Check the logs.');
    }

    return (await this.io.ask('\nPress Enter to continue...')) !== null;
  }
}

/**
 * MenuIO over stdin/stdout. `onInterrupt` runs on Ctrl+C.
 */
export function createTerminalIO(onInterrupt: () => void): MenuIO & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  const inputEnded = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });
  rl.on('SIGINT', onInterrupt);

  return {
    async ask(question: string): Promise<string | null> {
      if (closed) {
        return null;
      }
      // question() rejects when the interface closes underneath it
      const answer = rl.question(question).catch((): null => null);
      return Promise.race([answer, inputEnded]);
    },
    print(line: string = ''): void {
      console.log(line);
    },
    close(): void {
      rl.close();
    },
  };
}
