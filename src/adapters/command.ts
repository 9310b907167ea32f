import { spawn } from 'node:child_process';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs?: number;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

const STDERR_TAIL_LINES = 12;

function lineSplitter(onLine: ((line: string) => void) | undefined) {
  let pending = '';
  return {
    push(chunk: string) {
      if (!onLine) return;
      pending += chunk;
      const lines = pending.split(/\r?\n|\r/);
      pending = lines.pop() ?? '';
      for (const line of lines) {
        if (line) onLine(line);
      }
    },
    flush() {
      if (onLine && pending) onLine(pending);
      pending = '';
    },
  };
}

function tail(text: string): string {
  return text.trim().split(/\r?\n/).slice(-STDERR_TAIL_LINES).join('\n');
}

/**
 * Runs an external tool without a shell. Rejects with a CommandError on a
 * non-zero exit, a spawn failure or a timeout; the message carries the last
 * lines of stderr.
 */
export const runCommand: CommandRunner = (spec) =>
  new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    const out = lineSplitter(spec.onStdoutLine);
    const err = lineSplitter(spec.onStderrLine);

    const timer = spec.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, spec.timeoutMs)
      : null;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
      out.push(chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
      err.push(chunk);
    });

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(new CommandError(`${spec.command} could not be started: ${error.message}`, spec.command, null, stderr));
    });

    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      out.flush();
      err.flush();

      if (timedOut) {
        reject(new CommandError(`${spec.command} timed out after ${spec.timeoutMs}ms`, spec.command, code, stderr));
        return;
      }
      if (code !== 0) {
        const detail = tail(stderr);
        const message = `${spec.command} exited with code ${code}`;
        reject(new CommandError(detail ? `${message}\n${detail}` : message, spec.command, code, stderr));
        return;
      }
      resolve({ stdout, stderr });
    });
  });
