import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SshExecutor, toLines } from './ssh-executor';

type Scenario = {
  connectError?: string;
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  hang?: boolean;
};

const state = vi.hoisted(() => ({
  scenario: {} as Scenario,
  connects: [] as Array<Record<string, unknown>>,
  commands: [] as string[],
  ended: 0,
}));

vi.mock('ssh2', async () => {
  const { EventEmitter } = await import('events');

  class FakeChannel extends EventEmitter {
    stderr = new EventEmitter();
  }

  class Client extends EventEmitter {
    connect(config: Record<string, unknown>): this {
      state.connects.push(config);
      setImmediate(() => {
        if (state.scenario.connectError) {
          this.emit('error', new Error(state.scenario.connectError));
        } else {
          this.emit('ready');
        }
      });
      return this;
    }

    exec(command: string, callback: (err: Error | undefined, stream: FakeChannel) => void): this {
      state.commands.push(command);
      const stream = new FakeChannel();
      callback(undefined, stream);
      setImmediate(() => {
        if (state.scenario.stdout) stream.emit('data', Buffer.from(state.scenario.stdout));
        if (state.scenario.stderr) stream.stderr.emit('data', Buffer.from(state.scenario.stderr));
        if (!state.scenario.hang) stream.emit('close', state.scenario.exitCode ?? 0);
      });
      return this;
    }

    end(): this {
      state.ended += 1;
      return this;
    }
  }

  return { Client };
});

const executor = (commandTimeoutMs = 1_000) =>
  new SshExecutor({ username: 'root', password: 'test-secret', port: 2222, commandTimeoutMs });

describe('toLines', () => {
  it('splits output and drops the trailing newline', () => {
    expect(toLines('a\r\nb\n\n')).toEqual(['a', 'b']);
    expect(toLines('')).toEqual([]);
  });
});

describe('SshExecutor', () => {
  beforeEach(() => {
    state.scenario = {};
    state.connects = [];
    state.commands = [];
    state.ended = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns stdout lines and closes the session', async () => {
    state.scenario = { stdout: 'Available Spare: 100%\nMedia Errors: 0x0\n' };
    const result = await executor().run('192.0.2.10', 'esxcli nvme device log smart get -A vmhba2');

    expect(result).toEqual({ ok: true, lines: ['Available Spare: 100%', 'Media Errors: 0x0'] });
    expect(state.connects).toEqual([
      { host: '192.0.2.10', port: 2222, username: 'root', password: 'test-secret', readyTimeout: 1_000 },
    ]);
    expect(state.commands).toEqual(['esxcli nvme device log smart get -A vmhba2']);
    expect(state.ended).toBe(1);
  });

  it('reports connection errors as failures', async () => {
    state.scenario = { connectError: 'All configured authentication methods failed' };
    const result = await executor().run('192.0.2.10', 'true');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('All configured authentication methods failed');
    }
    expect(state.ended).toBe(1);
  });

  it('treats a non-zero exit status as a failure', async () => {
    state.scenario = { stderr: 'Unable to find device', exitCode: 1 };
    const result = await executor().run('192.0.2.10', 'esxcli storage core device smart get -d x');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Command on 192.0.2.10 exited with code 1: Unable to find device');
    }
  });

  it('gives up on a command that never finishes', async () => {
    state.scenario = { hang: true };
    const result = await executor(20).run('192.0.2.10', 'sleep 999');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Command on 192.0.2.10 timed out after 20 ms');
    }
    expect(state.ended).toBe(1);
  });
});
