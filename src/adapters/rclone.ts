import path from 'node:path';
import { z } from 'zod';
import { CommandRunner, runCommand } from './command.js';

const SizeSchema = z.object({
  count: z.number().optional(),
  bytes: z.number().default(0),
});

export interface RcloneOptions {
  binary: string;
  timeoutMs: number;
  run?: CommandRunner;
}

/** Thin wrapper over the rclone CLI. Methods reject when rclone fails. */
export class Rclone {
  private run: CommandRunner;

  constructor(private options: RcloneOptions) {
    this.run = options.run ?? runCommand;
  }

  /** Copies a file into `remote`; resolves to the remote path of the copy. */
  async copy(filePath: string, remote: string): Promise<string> {
    await this.run({
      command: this.options.binary,
      args: ['copy', filePath, remote],
      timeoutMs: this.options.timeoutMs,
    });
    return `${remote.replace(/\/$/, '')}/${path.basename(filePath)}`;
  }

  async size(remote: string): Promise<number> {
    const { stdout } = await this.run({
      command: this.options.binary,
      args: ['size', remote, '--json'],
      timeoutMs: this.options.timeoutMs,
    });
    return SizeSchema.parse(JSON.parse(stdout)).bytes;
  }
}
