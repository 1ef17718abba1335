import { MissingAttributeError } from '../lib/errors';
import logger from '../lib/logger';
import type { DriveHealthRecord, HealthStatus } from '../types/smart';
import { quoteArg, type DriveStrategy } from './types';

const log = logger.child(['parser', 'nvme']);

const KELVIN_OFFSET = 273.15;

const VERBATIM_KEYS = new Set(['NVM Subsystem Reliability Degradation', 'Volatile Memory Backup Device Failure']);
const PERCENT_KEYS = new Set(['Available Spare', 'Available Spare Threshold', 'Percentage Used']);
const HEX_KEYS = new Set(['Unsafe Shutdowns', 'Media Errors', 'Number of Error Info Log Entries']);

export const TEMPERATURE_ATTRIBUTE = 'Drive Temperature (Celcius)';
export const SPARE_ATTRIBUTE = 'Available Spare (%)';
export const SPARE_THRESHOLD_ATTRIBUTE = 'Available Spare Threshold (%)';

/** Splits on the first colon only; values such as timestamps keep theirs. */
export function splitKeyValue(line: string): [string, string] | undefined {
  const idx = line.indexOf(':');
  if (idx === -1) return undefined;
  return [line.slice(0, idx).trim(), line.slice(idx + 1).trim()];
}

/** `"300.15 K"` -> 27 */
export function kelvinToCelsius(raw: string): number | undefined {
  const kelvin = Number.parseFloat(raw.trim().split(/\s+/)[0]);
  if (!Number.isFinite(kelvin)) return undefined;
  return Math.round(kelvin - KELVIN_OFFSET);
}

/** `"42%"` -> 42 */
export function parsePercent(raw: string): number | undefined {
  const digits = raw.split('%')[0].trim();
  return /^[-+]?\d+$/.test(digits) ? Number.parseInt(digits, 10) : undefined;
}

/**
 * `"0x1a"` -> 26. Counters are 128-bit; past `Number.MAX_SAFE_INTEGER` the
 * exact value comes back as a decimal string.
 */
export function parseHexCounter(raw: string): number | string | undefined {
  const match = /^(?:0x)?([0-9a-f]+)$/i.exec(raw.trim());
  if (!match) return undefined;
  const amount = BigInt(`0x${match[1]}`);
  return amount <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(amount) : amount.toString();
}

function requireNumber(record: DriveHealthRecord, attribute: string): number {
  const value = record[attribute];
  if (typeof value !== 'number') {
    throw new MissingAttributeError(attribute);
  }
  return value;
}

/**
 * NVMe drives report no overall verdict; the drive counts as degraded once
 * the available spare has dropped to its threshold.
 */
export function evaluateSpareHealth(record: DriveHealthRecord): HealthStatus {
  const spare = requireNumber(record, SPARE_ATTRIBUTE);
  const threshold = requireNumber(record, SPARE_THRESHOLD_ATTRIBUTE);
  return spare <= threshold ? 'Not OK' : 'OK';
}

function applyLine(line: string, record: DriveHealthRecord): void {
  const pair = splitKeyValue(line.trim());
  if (!pair) return;
  const [key, value] = pair;

  if (VERBATIM_KEYS.has(key)) {
    record[key] = value;
  } else if (key === 'Composite Temperature') {
    const celsius = kelvinToCelsius(value);
    if (celsius !== undefined) record[TEMPERATURE_ATTRIBUTE] = celsius;
  } else if (PERCENT_KEYS.has(key)) {
    const pct = parsePercent(value);
    if (pct !== undefined) record[`${key} (%)`] = pct;
  } else if (HEX_KEYS.has(key)) {
    const amount = parseHexCounter(value);
    if (amount !== undefined) record[key] = amount;
  }
}

export const nvmeStrategy: DriveStrategy = {
  type: 'NVME',

  command(driveIdentifier) {
    return `esxcli nvme device log smart get -A ${quoteArg(driveIdentifier)}`;
  },

  parse(lines, record) {
    for (const line of lines) {
      applyLine(line, record);
    }

    try {
      record['Health Status'] = evaluateSpareHealth(record);
    } catch (err) {
      if (!(err instanceof MissingAttributeError)) throw err;
      log.warn('cannot evaluate spare health, marking drive as Unknown', {
        drive: record['Drive Name'],
        attribute: err.attribute,
      });
      record['Health Status'] = 'Unknown';
    }
  },
};
