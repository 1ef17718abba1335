export type HealthStatus = 'OK' | 'Not OK' | 'Unknown' | (string & {});

export type AttributeValue = string | number;

/**
 * Normalized S.M.A.R.T. attributes of one drive, keyed by the label shown in
 * the report. The three base attributes are always present.
 */
export interface DriveHealthRecord {
  'Drive Type': string;
  'Drive Name': string;
  'Health Status': HealthStatus;
  [attribute: string]: AttributeValue;
}

/** Records grouped by `"<server> (<host>)"`, in inventory order. */
export type ServerCollection = Record<string, DriveHealthRecord[]>;
