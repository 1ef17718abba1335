import { existsSync, readFileSync } from 'fs';
import { Environment, installJinjaCompat } from 'nunjucks';
import { ConfigError } from '../lib/errors';
import type { ServerCollection } from '../types/smart';

export type ReportVariables = {
  org: string;
  date: string;
  servers: ServerCollection;
};

let jinjaCompatInstalled = false;

/**
 * Renders the report template. Templates are written in Jinja syntax, so the
 * nunjucks compatibility layer is switched on (`servers.items()` and friends).
 */
export class ReportRenderer {
  private readonly env: Environment;

  constructor(private readonly templatePath: string) {
    if (!jinjaCompatInstalled) {
      installJinjaCompat();
      jinjaCompatInstalled = true;
    }
    this.env = new Environment(null, { autoescape: false, throwOnUndefined: false });
  }

  render(vars: ReportVariables): string {
    if (!existsSync(this.templatePath)) {
      throw new ConfigError(`Report template not found: ${this.templatePath}`);
    }
    const source = readFileSync(this.templatePath, 'utf8');
    return this.env.renderString(source, vars);
  }
}
