/**
 * Houses Store
 * Address-deduplicating, append-only pipe-delimited log of discovered buildings.
 *
 * WARNING: the default `truncate` mode empties the log every time a store is
 * constructed, discarding the houses saved by previous runs. Pass `mode: 'append'`
 * (HOUSES_LOG_MODE=append, or --append on the CLI) to keep them.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { BuildingRecord } from '@osm-houses/shared';
import { HarvesterErrors } from '../../errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('HousesStore');

export const FIELD_SEPARATOR = ' | ';

export const LOG_COLUMNS = [
  'Date',
  'Country',
  'City',
  'Address',
  'Latitude',
  'Longitude',
  'OSM_ID',
  'Building_Type',
  'Levels',
] as const;

export const LOG_HEADER = LOG_COLUMNS.join(FIELD_SEPARATOR);
export const LOG_RULE = '='.repeat(100);
export const HEADER_LINES = 2;

export type StoreMode = 'truncate' | 'append';

export interface HousesStoreOptions {
  outputDir?: string;
  fileName?: string;
  mode?: StoreMode;
  now?: () => Date;
}

export interface HousesStats {
  total: number;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time with second precision: YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function sanitizeAddress(address: string): string {
  return address.replace(/\|/g, ',');
}

export function formatRecordLine(
  timestamp: string,
  country: string,
  city: string,
  record: BuildingRecord
): string {
  return [
    timestamp,
    country,
    city,
    sanitizeAddress(record.address),
    record.latitude.toFixed(6),
    record.longitude.toFixed(6),
    String(record.externalId),
    record.buildingType,
    record.levels,
  ].join(FIELD_SEPARATOR);
}

function countLines(content: string): number {
  if (content.length === 0) {
    return 0;
  }
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}

export class HousesStore {
  readonly filePath: string;
  readonly mode: StoreMode;
  /** Data lines thrown away by a truncating start */
  readonly discardedLines: number = 0;
  private readonly now: () => Date;
  private existingAddresses: Set<string> = new Set();
  /** Sanitized addresses read back from an appended log */
  private persistedAddresses: Set<string> = new Set();

  /**
   * Prepare the log. Throws STORAGE_ERROR when the directory or file cannot be created.
   */
  constructor(options: HousesStoreOptions = {}) {
    const outputDir = options.outputDir ?? 'osm_houses';
    this.filePath = join(outputDir, options.fileName ?? 'houses_osm.txt');
    this.mode = options.mode ?? 'truncate';
    this.now = options.now ?? (() => new Date());

    try {
      mkdirSync(outputDir, { recursive: true });
      if (this.mode === 'append' && this.hasContent()) {
        this.loadExistingAddresses();
        logger.info(`Continuing houses log with ${this.persistedAddresses.size} known addresses`, {
          file: this.absolutePath,
        });
      } else {
        if (this.mode === 'truncate' && existsSync(this.filePath)) {
          this.discardedLines = this.getStats().total;
        }
        writeFileSync(this.filePath, `${LOG_HEADER}\n${LOG_RULE}\n`, 'utf-8');
        logger.info('Houses log cleared on startup', { file: this.absolutePath });
      }
    } catch (error) {
      throw HarvesterErrors.storageUnavailable(this.filePath, error);
    }
  }

  get absolutePath(): string {
    return resolve(this.filePath);
  }

  /**
   * Append a building unless its address is empty or already stored.
   * I/O failures are logged and reported as `false`.
   */
  addRecord(country: string, city: string, record: BuildingRecord): boolean {
    const address = record.address;
    if (
      !address ||
      this.existingAddresses.has(address) ||
      this.persistedAddresses.has(sanitizeAddress(address))
    ) {
      logger.debug(`Empty or duplicate address: ${address.slice(0, 50)}`);
      return false;
    }

    const line = formatRecordLine(formatTimestamp(this.now()), country, city, record);

    try {
      appendFileSync(this.filePath, `${line}\n`, 'utf-8');
    } catch (error) {
      logger.error(
        `Failed to write house: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }

    this.existingAddresses.add(address);
    logger.info(`House saved: ${sanitizeAddress(address).slice(0, 60)}`);
    return true;
  }

  /**
   * Count of stored houses, recomputed from the file on every call
   */
  getStats(): HousesStats {
    try {
      const content = readFileSync(this.filePath, 'utf-8');
      return { total: Math.max(0, countLines(content) - HEADER_LINES) };
    } catch {
      return { total: 0 };
    }
  }

  private hasContent(): boolean {
    return existsSync(this.filePath) && readFileSync(this.filePath, 'utf-8').length > 0;
  }

  private loadExistingAddresses(): void {
    const lines = readFileSync(this.filePath, 'utf-8').split('\n').slice(HEADER_LINES);
    const addressColumn = LOG_COLUMNS.indexOf('Address');

    for (const line of lines) {
      const fields = line.split(FIELD_SEPARATOR);
      if (fields.length === LOG_COLUMNS.length && fields[addressColumn]) {
        this.persistedAddresses.add(fields[addressColumn]);
      }
    }
  }
}
