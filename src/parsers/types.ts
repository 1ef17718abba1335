import type { DriveType } from '../types/inventory';
import type { DriveHealthRecord } from '../types/smart';

/**
 * Per drive type collection strategy: the diagnostic command to run on the
 * host and the parser for its output.
 */
export interface DriveStrategy {
  readonly type: DriveType;
  command(driveIdentifier: string): string;
  /** Adds the attributes found in `lines` to `record`. Never throws on odd input. */
  parse(lines: readonly string[], record: DriveHealthRecord): void;
}

/** POSIX single-quoting for values interpolated into a remote command line. */
export function quoteArg(value: string): string {
  if (value.length === 0) return "''";
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
