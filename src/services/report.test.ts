import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../lib/errors';
import type { ServerCollection } from '../types/smart';
import { ReportRenderer } from './report';

const SERVERS: ServerCollection = {
  'esx-01 (192.0.2.10)': [
    {
      'Drive Type': 'NVME',
      'Drive Name': 'vmhba2',
      'Health Status': 'Not OK',
      'Drive Temperature (Celcius)': 22,
    },
  ],
  'esx-02 (192.0.2.11)': [],
};

describe('ReportRenderer', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'smart-report-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('renders Jinja style templates with the report variables', () => {
    const templatePath = path.join(dir, 'report.j2');
    writeFileSync(
      templatePath,
      "{{ org }} {{ date }}\n{% for server, drives in servers.items() %}{{ server }}:{% for d in drives %} {{ d['Drive Name'] }}={{ d['Health Status'] }}{% endfor %}\n{% endfor %}"
    );

    const output = new ReportRenderer(templatePath).render({ org: 'R&D Org', date: '20261019', servers: SERVERS });

    expect(output).toBe('R&D Org 20261019\nesx-01 (192.0.2.10): vmhba2=Not OK\nesx-02 (192.0.2.11):\n');
  });

  it('renders the bundled HTML template', () => {
    const templatePath = path.resolve(process.cwd(), 'cfg/esxi-report.j2');
    const output = new ReportRenderer(templatePath).render({ org: 'Example Org', date: '20261019', servers: SERVERS });

    expect(output).toContain('<h2>S.M.A.R.T. report for Example Org (20261019)</h2>');
    expect(output).toContain('<h3>esx-01 (192.0.2.10)</h3>');
    expect(output).toContain('<tr><th>Health Status</th><td class="not-ok">Not OK</td></tr>');
    expect(output).toContain('<tr><th>Drive Temperature (Celcius)</th><td>22</td></tr>');
    expect(output).toContain('<p>No S.M.A.R.T. data could be retrieved for this server.</p>');
  });

  it('fails when the template is missing', () => {
    const renderer = new ReportRenderer(path.join(dir, 'absent.j2'));
    expect(() => renderer.render({ org: 'Example Org', date: '20261019', servers: {} })).toThrow(ConfigError);
  });
});
