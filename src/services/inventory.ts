import { parse } from 'csv-parse/sync';
import { existsSync, readFileSync } from 'fs';
import { ConfigError } from '../lib/errors';
import logger from '../lib/logger';
import type { InventoryEntry } from '../types/inventory';

const log = logger.child('inventory');

const COLUMN_COUNT = 4;

/**
 * Parses `server_name;host_address;drive_type;drive_identifier` rows. The
 * first row is a header and is always skipped.
 */
export function parseInventory(content: string): InventoryEntry[] {
  const rows: string[][] = parse(content, {
    delimiter: ';',
    from_line: 2,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const entries: InventoryEntry[] = [];
  rows.forEach((row, idx) => {
    if (row.length < COLUMN_COUNT || row.slice(0, COLUMN_COUNT).some((cell) => cell === '')) {
      log.warn('skipping incomplete inventory row', { row: idx + 2, cells: row });
      return;
    }
    const [serverName, hostAddress, driveType, driveIdentifier] = row;
    entries.push({ serverName, hostAddress, driveType, driveIdentifier });
  });
  return entries;
}

export function loadInventory(csvPath: string): InventoryEntry[] {
  if (!existsSync(csvPath)) {
    throw new ConfigError(`Inventory file not found: ${csvPath}`);
  }
  return parseInventory(readFileSync(csvPath, 'utf8'));
}
