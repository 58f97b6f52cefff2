import path from "node:path";

import chokidar, { type FSWatcher } from "chokidar";

import { appLogger, normalizeError } from "../observability/logger.js";

export type ConfigChangeType = "add" | "change" | "unlink";

export interface ConfigChangeEvent {
  type: ConfigChangeType;
  path: string;
}

export type ReloadTrigger = (structuredPath: string, legacyPath: string) => Promise<unknown>;

export interface ConfigWatcherOptions {
  structuredPath: string;
  legacyPath: string;
  onChange: ReloadTrigger;
  debounceMs?: number;
}

/**
 * Watches both configuration sources and turns bursts of file events into a
 * single reload call with the paths used at startup.
 */
export class ConfigWatcherService {
  private static readonly DEFAULT_DEBOUNCE_MS = 250;

  private watcher?: FSWatcher;
  private timer?: NodeJS.Timeout;
  private pendingEvents: ConfigChangeEvent[] = [];
  private inflight?: Promise<void>;
  private readonly structuredPath: string;
  private readonly legacyPath: string;
  private readonly onChange: ReloadTrigger;
  private readonly debounceMs: number;
  private readonly logger = appLogger.child({ component: "ConfigWatcherService" });

  constructor(options: ConfigWatcherOptions) {
    this.structuredPath = path.resolve(options.structuredPath);
    this.legacyPath = path.resolve(options.legacyPath);
    this.onChange = options.onChange;
    const configured = options.debounceMs;
    this.debounceMs =
      configured !== undefined && Number.isFinite(configured) && configured >= 0
        ? configured
        : ConfigWatcherService.DEFAULT_DEBOUNCE_MS;
  }

  start(): void {
    if (this.watcher) {
      return;
    }
    // chokidar tolerates paths that do not exist yet and reports them on creation.
    const watcher = chokidar.watch([this.structuredPath, this.legacyPath], {
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 200 },
    });

    watcher
      .on("add", (filePath: string) => this.schedule({ type: "add", path: filePath }))
      .on("change", (filePath: string) => this.schedule({ type: "change", path: filePath }))
      .on("unlink", (filePath: string) => this.schedule({ type: "unlink", path: filePath }))
      .on("error", (err: unknown) =>
        this.logger.warn({ err: normalizeError(err) }, "config watcher error"),
      );

    this.watcher = watcher;
    this.logger.info(
      { structuredPath: this.structuredPath, legacyPath: this.legacyPath, debounceMs: this.debounceMs },
      "watching configuration sources",
    );
  }

  isWatching(): boolean {
    return this.watcher !== undefined;
  }

  /** Resolves once the reload triggered by the latest burst has settled. */
  async flush(): Promise<void> {
    await this.inflight;
  }

  private schedule(event: ConfigChangeEvent): void {
    this.pendingEvents.push(event);
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      const events = this.pendingEvents;
      this.pendingEvents = [];
      this.inflight = this.trigger(events);
    }, this.debounceMs);
  }

  private async trigger(events: ConfigChangeEvent[]): Promise<void> {
    this.logger.info({ events }, "configuration change detected");
    try {
      await this.onChange(this.structuredPath, this.legacyPath);
    } catch (error) {
      this.logger.error({ err: normalizeError(error) }, "configuration reload trigger failed");
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.pendingEvents = [];
    const watcher = this.watcher;
    this.watcher = undefined;
    if (!watcher) {
      return;
    }
    try {
      await watcher.close();
    } catch (error) {
      this.logger.warn({ err: normalizeError(error) }, "failed to close config watcher");
    }
    await this.inflight;
  }
}
