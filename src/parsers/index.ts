import logger from '../lib/logger';
import { isDriveType, type DriveType } from '../types/inventory';
import type { DriveHealthRecord } from '../types/smart';
import { diskStrategy, sataStrategy } from './ata';
import { nvmeStrategy } from './nvme';
import type { DriveStrategy } from './types';

export type { DriveStrategy } from './types';

const log = logger.child('parser');

const STRATEGIES: Record<DriveType, DriveStrategy> = {
  NVME: nvmeStrategy,
  SATA: sataStrategy,
  DISK: diskStrategy,
};

export function strategyFor(driveType: string): DriveStrategy | undefined {
  return isDriveType(driveType) ? STRATEGIES[driveType] : undefined;
}

export function createBaseRecord(driveType: string, driveName: string): DriveHealthRecord {
  return {
    'Drive Type': driveType,
    'Drive Name': driveName,
    'Health Status': 'OK',
  };
}

/**
 * Turns the raw output of a drive's diagnostic command into a health record.
 * Unsupported drive types yield the base attributes only.
 */
export function parseDriveReport(
  driveType: string,
  driveName: string,
  lines: readonly string[]
): DriveHealthRecord {
  const record = createBaseRecord(driveType, driveName);
  const strategy = strategyFor(driveType);
  if (!strategy) {
    log.warn('unsupported drive type', { driveType, drive: driveName });
    return record;
  }
  strategy.parse(lines, record);
  return record;
}
