import type { DriveType } from '../types/inventory';
import { quoteArg, type DriveStrategy } from './types';

/**
 * `esxcli storage core device smart get` prints one row per parameter:
 *
 *   Parameter                 Value  Threshold  Worst  Raw
 *   Health Status             OK     N/A        N/A    N/A
 *   Drive Temperature         31     0          61     31
 *
 * Once the label is cut out of a row the Raw column is the 4th token. The
 * Health Status row carries its verdict in the Value column instead.
 */
export const RAW_TOKEN_INDEX = 3;
export const VALUE_TOKEN_INDEX = 0;

export interface LabelRule {
  label: string;
  attribute: string;
  tokenIndex: number;
}

const rule = (label: string, attribute = label, tokenIndex = RAW_TOKEN_INDEX): LabelRule => ({
  label,
  attribute,
  tokenIndex,
});

const HEALTH_RULE = rule('Health Status', 'Health Status', VALUE_TOKEN_INDEX);
const TEMPERATURE_RULE = rule('Drive Temperature', 'Drive Temperature (Celcius)');

export const SATA_RULES: readonly LabelRule[] = [
  HEALTH_RULE,
  TEMPERATURE_RULE,
  rule('Media Wearout Indicator'),
  rule('Reallocated Sector Count'),
  rule('Write Sectors TOT Count'),
  rule('Read Sectors TOT Count'),
  rule('Initial Bad Block Count'),
  rule('Program Fail Count'),
  rule('Erase Fail Count'),
  rule('Uncorrectable Error Count'),
  rule('Pending Sector Reallocation Count'),
];

export const DISK_RULES: readonly LabelRule[] = [
  HEALTH_RULE,
  TEMPERATURE_RULE,
  rule('Read Error Count'),
  rule('Reallocated Sector Count'),
  rule('Sector Reallocation Event Count'),
  rule('Pending Sector Reallocation Count'),
  rule('Uncorrectable Sector Count'),
];

/**
 * Token `index` of `line` once the first occurrence of `label` is removed,
 * along with a `:` separator directly after it (`Health Status: OK`).
 */
export function extractToken(line: string, label: string, index: number): string | undefined {
  const at = line.indexOf(label);
  if (at === -1) return undefined;
  const rest = `${line.slice(0, at)} ${line.slice(at + label.length).replace(/^\s*:/, '')}`;
  const tokens = rest.split(/\s+/).filter(Boolean);
  return index < tokens.length ? tokens[index] : undefined;
}

/**
 * Builds a strategy for drives read through the generic SMART command.
 * Values are kept as the raw strings printed by the host.
 */
export function createLabelStrategy(type: DriveType, rules: readonly LabelRule[]): DriveStrategy {
  return {
    type,

    command(driveIdentifier) {
      return `esxcli storage core device smart get -d ${quoteArg(driveIdentifier)}`;
    },

    parse(lines, record) {
      for (const line of lines) {
        for (const { label, attribute, tokenIndex } of rules) {
          const value = extractToken(line, label, tokenIndex);
          if (value !== undefined) record[attribute] = value;
        }
      }
    },
  };
}

export const sataStrategy = createLabelStrategy('SATA', SATA_RULES);
export const diskStrategy = createLabelStrategy('DISK', DISK_RULES);
