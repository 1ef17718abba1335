import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../lib/errors';
import { buildConfig, loadConfig } from './index';

const BASE = { ORG: 'Example Org', ESXI_PASS: 'test-secret' };

describe('buildConfig', () => {
  it('applies defaults for optional settings', () => {
    expect(buildConfig(BASE)).toEqual({
      org: 'Example Org',
      esxi: { user: 'root', password: 'test-secret', port: 22, commandTimeoutMs: 60000 },
      run: { haltOnFailure: false },
      smtp: undefined,
    });
  });

  it('uses the configured ESXi user', () => {
    expect(buildConfig({ ...BASE, ESXI_USER: 'monitor' }).esxi.user).toBe('monitor');
  });

  it('falls back to root for a blank ESXi user', () => {
    expect(buildConfig({ ...BASE, ESXI_USER: '  ' }).esxi.user).toBe('root');
  });

  it('rejects a missing password', () => {
    expect(() => buildConfig({ ORG: 'Example Org' })).toThrow('Missing required env var ESXI_PASS');
  });

  it('requires the SMTP settings once mail is enabled', () => {
    expect(() => buildConfig({ ...BASE, USE_SMTP: 'yes', SMTP_HOST: 'smtp.example.test' })).toThrow(
      'Missing required env var SMTP_PORT'
    );
  });

  it('reads SMTP settings when USE_SMTP is yes', () => {
    const config = buildConfig({
      ...BASE,
      USE_SMTP: 'yes',
      SMTP_HOST: 'smtp.example.test',
      SMTP_PORT: '587',
      SMTP_USER: 'mailer',
      SMTP_PASS: 'test-password',
      SMTP_FROM: 'smart@example.test',
      SMTP_TO: 'ops@example.test',
    });
    expect(config.smtp).toEqual({
      host: 'smtp.example.test',
      port: 587,
      user: 'mailer',
      password: 'test-password',
      from: 'smart@example.test',
      to: 'ops@example.test',
    });
  });

  it('ignores SMTP settings unless USE_SMTP is yes', () => {
    expect(buildConfig({ ...BASE, USE_SMTP: 'no', SMTP_HOST: 'smtp.example.test' }).smtp).toBeUndefined();
  });

  it('validates numbers and booleans', () => {
    expect(() => buildConfig({ ...BASE, ESXI_PORT: 'twenty-two' })).toThrow(ConfigError);
    expect(() => buildConfig({ ...BASE, HALT_ON_FAILURE: 'maybe' })).toThrow(
      'Env var HALT_ON_FAILURE must be boolean-like (yes/no)'
    );
    expect(buildConfig({ ...BASE, HALT_ON_FAILURE: 'yes' }).run.haltOnFailure).toBe(true);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'smart-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('parses an env file', () => {
    const envPath = path.join(dir, '.env');
    writeFileSync(envPath, 'ORG="Example Org"\nESXI_USER=admin\nESXI_PASS=test-secret\n# comment\n');
    const config = loadConfig(envPath);
    expect(config.org).toBe('Example Org');
    expect(config.esxi.user).toBe('admin');
    expect(config.esxi.password).toBe('test-secret');
  });

  it('does not export the settings into process.env', () => {
    const envPath = path.join(dir, '.env');
    writeFileSync(envPath, 'ORG=Isolated Org\nESXI_PASS=test-secret\n');
    loadConfig(envPath);
    expect(process.env.ORG).not.toBe('Isolated Org');
  });

  it('fails for a missing file', () => {
    expect(() => loadConfig(path.join(dir, 'absent.env'))).toThrow(ConfigError);
  });
});
