#!/usr/bin/env tsx
/**
 * OSM House Harvester
 *
 * Collects addresses of residential buildings from OpenStreetMap (Overpass API)
 * for a chosen city and appends them to a pipe-delimited houses log.
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { loadConfig, type HarvesterConfig } from './config/env.js';
import { loadCountries, type CityRegistry } from './config/countries.js';
import { HarvesterException, formatError } from './errors.js';
import { createTerminalIO, describeResult, formatProgress, HarvesterMenu, parseCount } from './cli/menu.js';
import { HouseGenerator } from './services/harvest/generator.js';
import { OverpassClient } from './services/osm/overpass-client.js';
import { HousesStore } from './services/store/houses-store.js';
import { configureLogger, createLogger } from './utils/logger.js';

const logger = createLogger('Main');

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  CONFIG_ERROR: 3,
} as const;

type GlobalOptions = {
  append?: boolean;
  outputDir?: string;
  verbose?: boolean;
};

interface Context {
  config: HarvesterConfig;
  cities: CityRegistry;
}

function initializeContext(options: GlobalOptions): Context {
  dotenv.config();
  const config = loadConfig(process.env);

  if (options.append) {
    config.store.mode = 'append';
  }
  if (options.outputDir) {
    config.store.outputDir = options.outputDir;
  }

  configureLogger({
    level: options.verbose ? 'debug' : config.logLevel,
    filePath: config.logFile,
  });

  return { config, cities: loadCountries() };
}

function createHarvester({ config, cities }: Context) {
  const client = new OverpassClient({
    baseURL: config.overpass.baseURL,
    timeout: config.overpass.timeoutMs,
    userAgent: config.overpass.userAgent,
    maxRetries: config.overpass.maxRetries,
    rateLimitBackoffMs: config.overpass.rateLimitBackoffMs,
    networkBackoffMs: config.overpass.networkBackoffMs,
  });

  const store = new HousesStore({
    outputDir: config.store.outputDir,
    fileName: config.store.fileName,
    mode: config.store.mode,
  });

  if (store.discardedLines > 0) {
    console.log(
      `⚠️ Previous houses log discarded (${store.discardedLines} lines). Use --append to keep it.`
    );
  }

  const generator = new HouseGenerator({
    client,
    store,
    cities,
    requestDelayMs: config.requestDelayMs,
  });

  return { client, store, generator };
}

function farewell(): never {
  console.log('\n\n👋 Stopped by user');
  process.exit(EXIT_CODES.SUCCESS);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('osm-houses')
    .description('Collect residential building addresses from OpenStreetMap')
    .version('0.1.0', '-V, --version', 'Output the version number')
    .option('--append', 'Keep the existing houses log instead of clearing it')
    .option('--output-dir <dir>', 'Directory of the houses log')
    .option('-v, --verbose', 'Enable debug logging');

  program
    .command('menu', { isDefault: true })
    .description('Interactive country → city menu')
    .action(async () => {
      const context = initializeContext(program.opts<GlobalOptions>());
      const { store, generator } = createHarvester(context);

      console.log('\n🆓 Using the free OpenStreetMap Overpass API (building=residential)');
      console.log('💡 OSM data quality varies by region; start with 10-20 houses');

      const io = createTerminalIO(farewell);
      try {
        await new HarvesterMenu({ generator, store, cities: context.cities, io }).run();
      } finally {
        io.close();
      }
    });

  program
    .command('generate')
    .description('Save houses for one city without the menu')
    .argument('<country>', 'Country key, e.g. germany')
    .argument('<city>', 'City key, e.g. berlin')
    .option('-n, --count <n>', 'Number of houses (1-100)', '10')
    .action(async (countryKey: string, cityKey: string, options: { count: string }) => {
      const context = initializeContext(program.opts<GlobalOptions>());
      const { store, generator } = createHarvester(context);

      const { count, warning } = parseCount(options.count);
      if (warning) {
        console.log(warning);
      }

      const result = await generator.generateHouses(countryKey, cityKey, count, (progress) =>
        console.log(formatProgress(progress))
      );
      describeResult(result, store.absolutePath).forEach((line) => console.log(line));

      if (result.status !== 'saved') {
        process.exitCode = EXIT_CODES.ERRORS;
      }
    });

  program
    .command('cities')
    .description('List the available countries and cities')
    .action(() => {
      const { cities } = initializeContext(program.opts<GlobalOptions>());
      for (const country of cities.listCountries()) {
        console.log(`${country.key} - ${country.name}`);
        for (const city of cities.listCities(country.key)) {
          console.log(`  ${city.key} - ${city.name}`);
        }
      }
    });

  return program;
}

async function main(): Promise<void> {
  process.on('SIGINT', farewell);
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`\n❌ Critical error: ${formatError(error)}`);
  logger.error('Fatal error', { error: formatError(error) });

  if (error instanceof HarvesterException && error.code === 'CONFIG_ERROR') {
    console.error(error.details);
    process.exit(EXIT_CODES.CONFIG_ERROR);
  }
  process.exit(EXIT_CODES.ERRORS);
});
