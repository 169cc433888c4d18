import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { PatchDispatcherService } from '../dispatcher/patch-dispatcher.service';

export const AUTORELOAD_DEFAULTS = {
  ENABLED: false,
  WATCH_DIRS: '.',
  INTERVAL_MS: 1000,
  /** Minimum gap between two reload broadcasts */
  DEBOUNCE_MS: 500,
} as const;

const WATCHED_EXTENSIONS = new Set(['.ts', '.js', '.html', '.htm', '.css', '.json']);
const IGNORED_DIRECTORIES = new Set(['.git', 'node_modules', 'dist', 'coverage']);

interface AutoReloadConfig {
  enabled: boolean;
  watchDirs: string[];
  intervalMs: number;
}

export type FileSnapshot = Map<string, number>;

/**
 * Development helper: polls file modification times and tells every open
 * tab to reload when something changed.
 */
@Injectable()
export class AutoReloadService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(AutoReloadService.name);
  private readonly config: AutoReloadConfig;
  private previous: FileSnapshot = new Map();
  private timer?: NodeJS.Timeout;
  private checking = false;
  private lastSignalAt = 0;

  constructor(
    private readonly dispatcher: PatchDispatcherService,
    @Optional() private readonly configService?: ConfigService,
  ) {
    this.config = this.loadConfig();
  }

  private loadConfig(): AutoReloadConfig {
    const dirs =
      this.configService?.get<string>('AUTORELOAD_WATCH_DIRS') ??
      AUTORELOAD_DEFAULTS.WATCH_DIRS;
    return {
      enabled:
        this.configService?.get<boolean>('AUTORELOAD_ENABLED') ??
        AUTORELOAD_DEFAULTS.ENABLED,
      watchDirs: dirs
        .split(',')
        .map((dir) => dir.trim())
        .filter((dir) => dir.length > 0)
        .map((dir) => resolve(dir)),
      intervalMs:
        this.configService?.get<number>('AUTORELOAD_INTERVAL_MS') ??
        AUTORELOAD_DEFAULTS.INTERVAL_MS,
    };
  }

  getConfig(): AutoReloadConfig {
    return { ...this.config, watchDirs: [...this.config.watchDirs] };
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.config.enabled) {
      await this.start();
    }
  }

  onModuleDestroy(): void {
    this.stop();
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    await this.prime();
    this.timer = setInterval(() => {
      this.check().catch((error: unknown) => {
        const err = error as Error;
        this.logger.warn(`File scan failed: ${err.message}`);
      });
    }, this.config.intervalMs);
    this.timer.unref();
    this.logger.log(`Watching ${this.config.watchDirs.join(', ')} for changes`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Take the baseline snapshot */
  async prime(): Promise<void> {
    this.previous = await this.snapshot();
  }

  /**
   * Compare against the last snapshot
   * @returns true when a reload was broadcast
   */
  async check(): Promise<boolean> {
    if (this.checking) {
      return false;
    }
    this.checking = true;
    try {
      const current = await this.snapshot();
      if (!AutoReloadService.filesChanged(this.previous, current)) {
        return false;
      }
      this.previous = current;
      return this.trigger();
    } finally {
      this.checking = false;
    }
  }

  /**
   * Broadcast a reload unless one went out within the debounce window
   */
  trigger(now: number = Date.now()): boolean {
    if (now - this.lastSignalAt < AUTORELOAD_DEFAULTS.DEBOUNCE_MS) {
      return false;
    }
    this.lastSignalAt = now;
    const delivered = this.dispatcher.broadcastReload();
    this.logger.log(`Files changed, reloading ${delivered} tab(s)`);
    return true;
  }

  async snapshot(): Promise<FileSnapshot> {
    const files: FileSnapshot = new Map();
    for (const dir of this.config.watchDirs) {
      await this.collect(dir, files);
    }
    return files;
  }

  static filesChanged(previous: FileSnapshot, current: FileSnapshot): boolean {
    if (previous.size !== current.size) {
      return true;
    }
    for (const [path, mtime] of current) {
      if (previous.get(path) !== mtime) {
        return true;
      }
    }
    return false;
  }

  private async collect(dir: string, files: FileSnapshot): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      // directory vanished or unreadable: nothing to watch there
      return;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          await this.collect(path, files);
        }
        continue;
      }
      if (!entry.isFile() || !WATCHED_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
        continue;
      }
      try {
        files.set(path, (await stat(path)).mtimeMs);
      } catch {
        // removed between readdir and stat
      }
    }
  }
}
