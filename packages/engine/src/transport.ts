/**
 * Line-oriented channel to an engine process
 */

import { spawn } from 'node:child_process';
import * as readline from 'node:readline';

export type LineListener = (line: string) => void;
export type ExitListener = (code: number | null, error?: Error) => void;

/**
 * The process boundary. Commands go in one line at a time, output comes
 * back line by line, and exit is reported exactly once.
 */
export interface EngineTransport {
  send(command: string): void;
  onLine(listener: LineListener): void;
  onExit(listener: ExitListener): void;
  kill(): void;
}

export type TransportFactory = () => EngineTransport;

const STDERR_TAIL_LENGTH = 500;

/**
 * Start an engine binary and talk to it over stdio
 */
export function spawnTransport(enginePath: string, args: readonly string[] = []): EngineTransport {
  const proc = spawn(enginePath, [...args], {
    stdio: ['pipe', 'pipe', 'pipe'],
    windowsHide: true,
  });
  const rl = readline.createInterface({ input: proc.stdout });

  const lineListeners: LineListener[] = [];
  const exitListeners: ExitListener[] = [];
  let exited = false;
  let stderrTail = '';

  const notifyExit = (code: number | null, error?: Error): void => {
    if (exited) return;
    exited = true;
    rl.close();
    for (const listener of exitListeners) {
      listener(code, error);
    }
  };

  rl.on('line', (line) => {
    for (const listener of lineListeners) {
      listener(line);
    }
  });
  proc.stderr.on('data', (chunk: Buffer) => {
    stderrTail = (stderrTail + chunk.toString()).slice(-STDERR_TAIL_LENGTH);
  });
  // spawn failures (ENOENT, EACCES) arrive here rather than as a throw
  proc.on('error', (err) => notifyExit(null, err));
  proc.stdin.on('error', (err) => notifyExit(null, err));
  proc.on('close', (code) => {
    const stderr = stderrTail.trim();
    notifyExit(code, code !== 0 && stderr ? new Error(stderr) : undefined);
  });

  return {
    send(command: string): void {
      if (!exited && proc.stdin.writable) {
        proc.stdin.write(`${command}\n`);
      }
    },
    onLine(listener: LineListener): void {
      lineListeners.push(listener);
    },
    onExit(listener: ExitListener): void {
      exitListeners.push(listener);
    },
    kill(): void {
      if (!exited) {
        proc.kill('SIGKILL');
      }
    },
  };
}
