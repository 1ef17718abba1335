import logger, { type Logger } from '../lib/logger';
import { parseDriveReport, strategyFor } from '../parsers';
import type { RemoteExecutor } from '../services/ssh-executor';
import { serverKey, type InventoryEntry } from '../types/inventory';
import type { ServerCollection } from '../types/smart';

export type SmartControllerOptions = {
  /** Stop the whole run at the first drive that cannot be queried. */
  haltOnFailure?: boolean;
  logger?: Logger;
};

export type CollectSummary = {
  servers: ServerCollection;
  succeeded: number;
  failed: number;
  skipped: number;
  halted: boolean;
};

/**
 * Walks the inventory one drive at a time: resolve the command for the drive
 * type, run it on the host, parse the output and file the record under its
 * server.
 */
export class SmartController {
  private readonly haltOnFailure: boolean;
  private readonly log: Logger;

  constructor(
    private readonly executor: RemoteExecutor,
    options: SmartControllerOptions = {}
  ) {
    this.haltOnFailure = options.haltOnFailure ?? false;
    this.log = options.logger ?? logger.child('collector');
  }

  async collect(entries: readonly InventoryEntry[]): Promise<CollectSummary> {
    const summary: CollectSummary = { servers: {}, succeeded: 0, failed: 0, skipped: 0, halted: false };

    for (const [index, entry] of entries.entries()) {
      const key = serverKey(entry);
      const drive = entry.driveIdentifier;
      this.log.info(`starting collection for ${entry.serverName} drive ${drive}`);

      if (!summary.servers[key]) {
        summary.servers[key] = [];
      }

      const strategy = strategyFor(entry.driveType);
      if (!strategy) {
        this.log.warn('unsupported drive type, skipping drive', {
          server: entry.serverName,
          drive,
          driveType: entry.driveType,
        });
        summary.skipped += 1;
        continue;
      }

      const result = await this.executor.run(entry.hostAddress, strategy.command(drive));
      if (!result.ok) {
        summary.failed += 1;
        this.log.error(`command for ${entry.serverName}, drive ${drive} unsuccessful`, {
          host: entry.hostAddress,
          err: result.error,
        });
        if (this.haltOnFailure) {
          this.log.warn('halting run after failed drive', { remaining: entries.length - index - 1 });
          summary.halted = true;
          break;
        }
        continue;
      }

      summary.servers[key].push(parseDriveReport(entry.driveType, drive, result.lines));
      summary.succeeded += 1;
      this.log.info(`command for ${entry.serverName}, drive ${drive} successful`);
    }

    return summary;
  }
}
