import { Logger } from '../logger.js';
import { SnapshotFile } from '../util/snapshot-file.js';

export interface ConfigSnapshot<T> {
  version: number;
  loadedAt: Date;
  origin: 'file' | 'default';
  value: T;
}

export interface ConfigProvider<T> {
  current(): T;
  snapshot(): ConfigSnapshot<T>;
  reload(): Promise<ConfigSnapshot<T>>;
}

export type ConfigUpdate = 'updated' | 'missing' | 'not_saved';

export interface JsonConfigProviderOptions<TFile, TValue> {
  name: string;
  file: SnapshotFile<TFile>;
  build: (doc: TFile) => TValue;
  fallback: () => TValue;
  log: Logger;
}

/**
 * Versioned, reloadable view of a JSON config file.
 *
 * `reload()` builds a complete new snapshot before swapping the reference,
 * so readers going through `current()` see either the old or the new table.
 * A missing or invalid file yields the fallback value.
 */
export class JsonConfigProvider<TFile, TValue> implements ConfigProvider<TValue> {
  private state: ConfigSnapshot<TValue>;
  private log: Logger;

  constructor(private options: JsonConfigProviderOptions<TFile, TValue>) {
    this.log = options.log.child({ config: options.name });
    this.state = {
      version: 0,
      loadedAt: new Date(),
      origin: 'default',
      value: options.fallback(),
    };
  }

  current(): TValue {
    return this.state.value;
  }

  snapshot(): ConfigSnapshot<TValue> {
    return this.state;
  }

  get filePath(): string {
    return this.options.file.filePath;
  }

  async reload(): Promise<ConfigSnapshot<TValue>> {
    const loaded = await this.options.file.load();
    const version = this.state.version + 1;

    if (loaded.status === 'loaded') {
      this.state = { version, loadedAt: new Date(), origin: 'file', value: this.options.build(loaded.data) };
      this.log.info({ file: this.filePath, version }, 'config loaded');
    } else {
      if (loaded.status === 'invalid') {
        this.log.warn({ file: this.filePath, reason: loaded.reason }, 'config invalid, using defaults');
      } else {
        this.log.info({ file: this.filePath }, 'config not found, using defaults');
      }
      this.state = { version, loadedAt: new Date(), origin: 'default', value: this.options.fallback() };
    }
    return this.state;
  }

  /**
   * Applies `mutate` to the document on disk, writes it back and reloads.
   * `missing` when the file is absent or invalid or `mutate` returns null;
   * `not_saved` when the write fails and nothing changed.
   */
  async update(mutate: (doc: TFile) => TFile | null): Promise<ConfigUpdate> {
    const loaded = await this.options.file.load();
    if (loaded.status !== 'loaded') return 'missing';

    const next = mutate(loaded.data);
    if (next === null) return 'missing';

    const saved = await this.options.file.save(next);
    if (!saved) return 'not_saved';

    await this.reload();
    return 'updated';
  }
}
