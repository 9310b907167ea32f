import { Rclone } from '../adapters/rclone.js';
import { errorMessage } from '../errors.js';
import { Logger } from '../logger.js';

export interface RemoteSyncOptions {
  enabled: boolean;
  remote: string | null;
  rclone: Rclone;
  log: Logger;
}

/** Optional off-host copy of outputs. Every failure is logged and reported as null. */
export class RemoteSync {
  private log: Logger;

  constructor(private options: RemoteSyncOptions) {
    this.log = options.log.child({ component: 'remote-sync' });
  }

  get enabled(): boolean {
    return this.options.enabled && this.options.remote !== null;
  }

  async syncToRemote(filePath: string): Promise<string | null> {
    const remote = this.options.remote;
    if (!this.options.enabled || !remote) return null;

    try {
      const remotePath = await this.options.rclone.copy(filePath, remote);
      this.log.info({ file: filePath, remotePath }, 'synced to remote');
      return remotePath;
    } catch (error) {
      this.log.error({ file: filePath, err: errorMessage(error) }, 'remote sync failed');
      return null;
    }
  }

  async getRemoteUsage(): Promise<number | null> {
    const remote = this.options.remote;
    if (!this.options.enabled || !remote) return null;

    try {
      return await this.options.rclone.size(remote);
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, 'failed to read remote usage');
      return null;
    }
  }
}
