import { Client } from 'ssh2';
import logger from '../lib/logger';

const log = logger.child('ssh');

export type RemoteCommandResult =
  | { ok: true; lines: string[] }
  | { ok: false; error: Error };

/** Runs one command on a host. Implementations resolve with a failure instead of rejecting. */
export interface RemoteExecutor {
  run(host: string, command: string): Promise<RemoteCommandResult>;
}

export type SshExecutorOptions = {
  username: string;
  password: string;
  port?: number;
  commandTimeoutMs?: number;
};

export function toLines(output: string): string[] {
  const lines = output.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Opens a fresh SSH session for every command and always closes it before
 * resolving. Host keys are accepted without verification, as ESXi hosts
 * commonly run with self-generated keys.
 */
export class SshExecutor implements RemoteExecutor {
  private readonly port: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: SshExecutorOptions) {
    this.port = options.port ?? 22;
    this.timeoutMs = options.commandTimeoutMs ?? 60_000;
  }

  async run(host: string, command: string): Promise<RemoteCommandResult> {
    log.debug('running remote command', { host, command });
    try {
      const stdout = await this.exec(host, command);
      return { ok: true, lines: toLines(stdout) };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.debug('remote command failed', { host, command, err: error });
      return { ok: false, error };
    }
  }

  private exec(host: string, command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const client = new Client();
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const finish = (err: Error | undefined, output = '') => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        client.end();
        if (err) {
          reject(err);
        } else {
          resolve(output);
        }
      };

      const timer = setTimeout(() => {
        finish(new Error(`Command on ${host} timed out after ${this.timeoutMs} ms`));
      }, this.timeoutMs);

      client.on('ready', () => {
        client.exec(command, (err, stream) => {
          if (err) {
            finish(err);
            return;
          }
          stream.on('data', (chunk: Buffer) => stdout.push(chunk));
          stream.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
          stream.on('close', (code: unknown) => {
            if (typeof code === 'number' && code !== 0) {
              const detail = Buffer.concat(stderr).toString('utf8').trim();
              finish(new Error(`Command on ${host} exited with code ${code}${detail ? `: ${detail}` : ''}`));
              return;
            }
            finish(undefined, Buffer.concat(stdout).toString('utf8'));
          });
        });
      });

      client.on('error', (err: Error) => finish(err));

      client.connect({
        host,
        port: this.port,
        username: this.options.username,
        password: this.options.password,
        readyTimeout: this.timeoutMs,
      });
    });
  }
}
