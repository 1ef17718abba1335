#!/usr/bin/env node
import path from 'path';
import { HELP_TEXT, parseCliArgs, type ParsedCli } from './cli/args';
import { loadConfig, type Config } from './config';
import { RunController } from './controllers/run.controller';
import { SmartController } from './controllers/smart.controller';
import { ConfigError, UsageError } from './lib/errors';
import logger, { attachLogFile } from './lib/logger';
import { formatDate, formatDuration, formatTime } from './lib/time';
import { loadInventory } from './services/inventory';
import { Mailer } from './services/mailer';
import { ReportRenderer } from './services/report';
import { SshExecutor } from './services/ssh-executor';
import type { InventoryEntry } from './types/inventory';

const pkg: { version?: string } = require('../package.json');

const stamp = (date: Date): string => `${formatDate(date)}-${formatTime(date)}`;

async function start(argv: string[]): Promise<number> {
  const startedAt = new Date();

  let cli: ParsedCli;
  try {
    cli = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
  if (cli.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  attachLogFile(path.join(cli.logDir, `${formatDate(startedAt)}-esxitools-log.txt`));
  logger.info(`starting esxi-smart-reporter ${pkg.version ?? 'unknown'} at ${stamp(startedAt)}`);
  logger.info('input paths', {
    log: cli.logDir,
    csv: cli.inventoryPath,
    env: cli.envPath,
    rep: cli.templatePath,
  });

  let config: Config;
  let inventory: InventoryEntry[];
  try {
    config = loadConfig(cli.envPath);
    inventory = loadInventory(cli.inventoryPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
  logger.info(`loaded env file for organization ${config.org}`);
  logger.info('loaded the inventory', { drives: inventory.length });

  const executor = new SshExecutor({
    username: config.esxi.user,
    password: config.esxi.password,
    port: config.esxi.port,
    commandTimeoutMs: config.esxi.commandTimeoutMs,
  });
  const collector = new SmartController(executor, {
    haltOnFailure: cli.haltOnFailure || config.run.haltOnFailure,
  });
  const run = new RunController(config, {
    collector,
    renderer: new ReportRenderer(cli.templatePath),
    notifier: config.smtp ? new Mailer(config.smtp) : undefined,
  });

  await run.run(inventory);

  const finishedAt = new Date();
  logger.info(`finished esxi-smart-reporter at ${stamp(finishedAt)}`);
  logger.info(`total execution time: ${formatDuration(finishedAt.getTime() - startedAt.getTime())}`);
  return 0;
}

start(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('run aborted', { err });
    process.exit(1);
  });
