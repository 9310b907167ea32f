import { errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { MaintenanceReport } from '../types/storage.js';
import { StorageLifecycle } from './lifecycle.js';

export interface TaskRetention {
  cleanupOlderThan(retentionMs: number): Promise<number>;
}

export interface MaintenanceSchedulerOptions {
  lifecycle: StorageLifecycle;
  tasks: TaskRetention;
  intervalMs: number;
  taskRetentionMs: number;
  log: Logger;
}

export interface MaintenanceRun {
  storage: MaintenanceReport;
  tasksRemoved: number;
}

/** Periodic storage maintenance plus task retention. A zero interval disables the timer. */
export class MaintenanceScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<MaintenanceRun | null> | null = null;
  private log: Logger;

  constructor(private options: MaintenanceSchedulerOptions) {
    this.log = options.log.child({ component: 'maintenance' });
  }

  start(): void {
    if (this.timer || this.options.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
    this.log.info({ intervalMs: this.options.intervalMs }, 'maintenance scheduled');
  }

  /** One pass; overlapping calls share the run already in progress. Resolves to null on failure. */
  runOnce(): Promise<MaintenanceRun | null> {
    if (!this.running) {
      this.running = this.execute().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }

  private async execute(): Promise<MaintenanceRun | null> {
    try {
      const storage = await this.options.lifecycle.runMaintenance();
      const tasksRemoved = await this.options.tasks.cleanupOlderThan(this.options.taskRetentionMs);
      if (tasksRemoved > 0) {
        this.log.info({ tasksRemoved }, 'old tasks removed');
      }
      return { storage, tasksRemoved };
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, 'maintenance run failed');
      return null;
    }
  }
}
