/**
 * GNU screen adapter
 *
 * `screen -ls` exits 1 both when sessions exist and when there are none, so
 * exit code 1 is accepted and the output parsed either way.
 */

import { CommandFailedError } from '@slotwarden/ipc';
import type { SessionRef } from '@slotwarden/ipc';
import { runCommand } from './exec';
import type { CommandRunner } from './exec';
import type { SessionRuntime } from './types';

/** `\t12345.name\t(Detached)` lines → refs */
export function parseScreenList(stdout: string): SessionRef[] {
  const sessions: SessionRef[] = [];
  for (const line of stdout.split('\n')) {
    const m = /^\s+(\d+)\.(\S+)\s+\(/.exec(line);
    if (m) sessions.push({ pid: Number(m[1]), name: m[2] });
  }
  return sessions;
}

export interface ScreenOptions {
  binary?: string;
  run?: CommandRunner;
  /** Sends a signal to a process; defaults to process.kill */
  signal?: (pid: number, signal: NodeJS.Signals) => void;
}

export class ScreenSessionRuntime implements SessionRuntime {
  private readonly binary: string;
  private readonly run: CommandRunner;
  private readonly sendSignal: (pid: number, signal: NodeJS.Signals) => void;

  constructor(options: ScreenOptions = {}) {
    this.binary = options.binary ?? 'screen';
    this.run = options.run ?? runCommand;
    this.sendSignal = options.signal ?? ((pid, sig) => process.kill(pid, sig));
  }

  async listSessions(): Promise<SessionRef[]> {
    const { stdout } = await this.run(this.binary, ['-ls'], { allowExitCodes: [1] });
    return parseScreenList(stdout);
  }

  async startSession(name: string, command: string[]): Promise<SessionRef> {
    await this.run(this.binary, ['-dmS', name, ...command]);
    const started = (await this.listSessions()).find((s) => s.name === name);
    if (!started) {
      throw new CommandFailedError(`${this.binary} -dmS ${name}`, 0, 'session exited immediately', false);
    }
    return started;
  }

  async quitSession(session: SessionRef): Promise<void> {
    await this.run(this.binary, ['-S', `${session.pid}.${session.name}`, '-X', 'quit']);
  }

  async killSession(session: SessionRef): Promise<void> {
    try {
      this.sendSignal(session.pid, 'SIGKILL');
    } catch (err) {
      // Already gone
      if ((err as NodeJS.ErrnoException).code === 'ESRCH') return;
      throw err;
    }
  }
}
