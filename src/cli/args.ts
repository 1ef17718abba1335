import { UsageError } from '../lib/errors';

export interface CliArgs {
  logDir: string;
  inventoryPath: string;
  envPath: string;
  templatePath: string;
  haltOnFailure: boolean;
}

export type ParsedCli = { help: true } | ({ help: false } & CliArgs);

export const HELP_TEXT = `
Usage: esxi-smart-reporter -l <dir> -c <file> -e <file> -r <file> [--halt-on-failure]

Options:
  -l, --log <dir>        (Required) Log directory, like '/home/user/logs/'
  -c, --csv <file>       (Required) Inventory CSV file, like '/home/user/inventory.csv'
  -e, --env <file>       (Required) Env file with credentials, like '/home/user/.env'
  -r, --rep <file>       (Required) Report template, like '/home/user/report.j2'
      --halt-on-failure  Stop at the first drive that cannot be queried
  -h, --help             Show this help message
`.trim();

type PathFlag = 'logDir' | 'inventoryPath' | 'envPath' | 'templatePath';

const PATH_FLAGS: Record<string, PathFlag> = {
  '-l': 'logDir',
  '--log': 'logDir',
  '-c': 'inventoryPath',
  '--csv': 'inventoryPath',
  '-e': 'envPath',
  '--env': 'envPath',
  '-r': 'templatePath',
  '--rep': 'templatePath',
};

/** Accepts both `--log dir` and `--log=dir`. */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const paths: Partial<Record<PathFlag, string>> = {};
  let haltOnFailure = false;

  for (let index = 0; index < argv.length; index += 1) {
    const [token, inline] = splitInline(argv[index]);

    if (token === '-h' || token === '--help') {
      return { help: true };
    }
    if (token === '--halt-on-failure') {
      haltOnFailure = true;
      continue;
    }

    const target = Object.hasOwn(PATH_FLAGS, token) ? PATH_FLAGS[token] : undefined;
    if (!target) {
      throw new UsageError(`Unknown argument '${token}'. Use '-h' for more information`);
    }

    const value = inline ?? argv[index + 1];
    if (value === undefined || value === '' || (inline === undefined && value.startsWith('-'))) {
      throw new UsageError(`Missing value for ${token}. Use '-h' for more information`);
    }
    if (inline === undefined) index += 1;
    paths[target] = value;
  }

  const { logDir, inventoryPath, envPath, templatePath } = paths;
  if (!logDir || !inventoryPath || !envPath || !templatePath) {
    throw new UsageError("Please provide all required arguments. Use '-h' for more information");
  }

  return { help: false, logDir, inventoryPath, envPath, templatePath, haltOnFailure };
}

function splitInline(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) return [arg, undefined];
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}
