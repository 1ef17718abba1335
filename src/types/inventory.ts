export const DRIVE_TYPES = ['NVME', 'SATA', 'DISK'] as const;

export type DriveType = (typeof DRIVE_TYPES)[number];

export function isDriveType(value: string): value is DriveType {
  return (DRIVE_TYPES as readonly string[]).includes(value);
}

/**
 * One row of the inventory file. `driveType` is kept exactly as read so an
 * unsupported tag can still be reported.
 */
export interface InventoryEntry {
  serverName: string;   // ex: "esx-01"
  hostAddress: string;  // ex: "192.0.2.10"
  driveType: string;    // ex: "NVME"
  driveIdentifier: string; // ex: "vmhba2" or "t10.ATA_____Samsung_SSD..."
}

export function serverKey(entry: Pick<InventoryEntry, 'serverName' | 'hostAddress'>): string {
  return `${entry.serverName} (${entry.hostAddress})`;
}
