/**
 * Environment Manager - owns the loaded configuration and the active environment
 *
 * State is a single immutable snapshot of (configuration, active) that is
 * swapped whole on every committed mutation. Mutations are serialized through
 * one promise chain, so a reload racing a switch can never leave the active
 * environment pointing at a configuration the manager no longer holds.
 */

import { PreconditionError, UnknownEnvironmentError } from "../config/errors.js";
import {
  resolveConfiguration,
  type ConfigSourceKind,
  type ResolvedConfiguration,
} from "../config/resolveConfig.js";
import type { EnvironmentConfig, EnvironmentsConfiguration } from "../config/schema.js";
import { logEnvironmentAudit, type EnvironmentAuditEvent } from "../observability/audit.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { redactCredentials, toCredentialSet, type CredentialSet } from "./credentials.js";

export type EnvironmentState = "uninitialized" | "loaded" | "active";

export interface ActiveEnvironment {
  readonly name: string;
  readonly config: EnvironmentConfig;
  readonly activatedAt: Date;
}

export type ConfigurationResolver = (structuredPath: string, legacyPath: string) => Promise<ResolvedConfiguration>;

export type ReloadOutcome =
  | {
      status: "applied";
      source: ConfigSourceKind;
      environments: string[];
      previousActive?: string;
      active?: string;
      /** True when the previously active environment vanished and the default took over. */
      fallback: boolean;
    }
  | { status: "rejected"; error: Error };

export interface EnvironmentManagerOptions {
  resolver?: ConfigurationResolver;
  clock?: () => Date;
  logger?: AppLogger;
  audit?: (event: EnvironmentAuditEvent) => void;
}

type Snapshot = {
  readonly configuration: EnvironmentsConfiguration;
  readonly active?: ActiveEnvironment;
};

type PreparedReload = {
  resolved: ResolvedConfiguration;
  previousActive?: string;
  active?: ActiveEnvironment;
  fallback: boolean;
};

const NOT_LOADED_MESSAGE = "Configuration not loaded. Call load() first.";
const NOT_ACTIVE_MESSAGE = "No active environment set. Call activateDefault() or switchTo() first.";

function formatDescription(config: EnvironmentConfig): string {
  return config.description ?? "N/A";
}

function formatTags(config: EnvironmentConfig): string {
  return config.tags.length > 0 ? config.tags.join(", ") : "N/A";
}

export class EnvironmentManager {
  private snapshot?: Snapshot;
  private mutationChain: Promise<void> = Promise.resolve();
  private readonly resolver: ConfigurationResolver;
  private readonly clock: () => Date;
  private readonly logger: AppLogger;
  private readonly audit: (event: EnvironmentAuditEvent) => void;

  constructor(options: EnvironmentManagerOptions = {}) {
    this.resolver = options.resolver ?? resolveConfiguration;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? appLogger.child({ component: "EnvironmentManager" });
    this.audit = options.audit ?? logEnvironmentAudit;
  }

  getState(): EnvironmentState {
    if (!this.snapshot) {
      return "uninitialized";
    }
    return this.snapshot.active ? "active" : "loaded";
  }

  /**
   * Resolve and store the configuration. Failures propagate and leave the
   * manager uninitialized; a host must not serve without configuration.
   */
  load(structuredPath: string, legacyPath: string): Promise<void> {
    return this.exclusive(async () => {
      if (this.snapshot) {
        throw new PreconditionError("Configuration already loaded. Use reload() to pick up changes.");
      }
      let resolved: ResolvedConfiguration;
      try {
        resolved = await this.resolver(structuredPath, legacyPath);
      } catch (error) {
        this.logger.error({ err: normalizeError(error) }, "failed to load configuration");
        throw error;
      }
      this.snapshot = Object.freeze({ configuration: resolved.configuration });
      this.logger.info(
        { source: resolved.source, path: resolved.path, environments: resolved.configuration.environments.size },
        `Loaded ${resolved.configuration.environments.size} environment(s)`,
      );
    });
  }

  activateDefault(): Promise<ActiveEnvironment> {
    return this.exclusive(() => {
      const { configuration } = this.requireSnapshot();
      const active = this.activate(configuration, configuration.default);
      this.snapshot = Object.freeze({ configuration, active });
      this.logger.info(
        { environment: active.name, host: active.config.host },
        `Active environment set to default: ${active.name}`,
      );
      this.recordAudit({ action: "environment.activate", outcome: "success", environment: active.name });
      return active;
    });
  }

  /**
   * Make `name` the active environment.
   * @returns confirmation text with host, description and tags
   * @throws UnknownEnvironmentError listing every configured name
   */
  switchTo(name: string): Promise<string> {
    return this.exclusive(() => {
      const current = this.requireSnapshot();
      const previous = current.active?.name;
      const active = this.activate(current.configuration, name);
      this.snapshot = Object.freeze({ configuration: current.configuration, active });

      const credentials = redactCredentials(toCredentialSet(active.config));
      if (previous && previous !== name) {
        this.logger.info({ from: previous, to: name, credentials }, `Environment switched: ${previous} -> ${name}`);
      } else {
        this.logger.info({ to: name, credentials }, `Environment set to: ${name}`);
      }
      this.recordAudit({
        action: "environment.switch",
        outcome: "success",
        environment: name,
        details: { from: previous, to: name, host: active.config.host },
      });

      return (
        `Switched to environment: ${name}\n` +
        `Host: ${active.config.host}\n` +
        `Description: ${formatDescription(active.config)}\n` +
        `Tags: ${formatTags(active.config)}`
      );
    });
  }

  /**
   * Re-read configuration after a file change. Never throws: a failed reload
   * keeps the last good snapshot and reports `rejected`, and once the new
   * snapshot is committed the outcome is `applied` whatever happens after.
   */
  reload(structuredPath: string, legacyPath: string): Promise<ReloadOutcome> {
    return this.exclusive(async (): Promise<ReloadOutcome> => {
      let next: PreparedReload;
      try {
        next = await this.prepareReload(structuredPath, legacyPath);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        this.logger.error(
          { err: normalizeError(error) },
          `Failed to reload configuration: ${error.message}. Keeping current configuration.`,
        );
        this.recordAudit({ action: "environment.reload", outcome: "rejected", error: error.message });
        return { status: "rejected", error };
      }

      const { resolved, previousActive, active, fallback } = next;
      const configuration = resolved.configuration;
      this.snapshot = Object.freeze({ configuration, active });

      if (fallback && active) {
        this.logger.warn(
          { previous: previousActive, current: active.name },
          `Active environment '${previousActive}' no longer exists in configuration. Resetting to default: ${active.name}`,
        );
        this.recordAudit({
          action: "environment.fallback",
          outcome: "fallback",
          environment: active.name,
          details: { from: previousActive, to: active.name, reason: "environment_removed" },
        });
      } else if (active) {
        this.logger.info({ environment: active.name }, `Active environment '${active.name}' updated with new configuration`);
      }
      this.recordAudit({
        action: "environment.reload",
        outcome: "success",
        environment: active?.name,
        details: { source: resolved.source, environments: configuration.listEnvironmentNames() },
      });
      this.logger.info("Configuration reload successful");

      return {
        status: "applied",
        source: resolved.source,
        environments: configuration.listEnvironmentNames(),
        previousActive,
        active: active?.name,
        fallback,
      };
    });
  }

  getActiveName(): string | undefined {
    return this.snapshot?.active?.name;
  }

  getActive(): ActiveEnvironment {
    const active = this.snapshot?.active;
    if (!active) {
      throw new PreconditionError(NOT_ACTIVE_MESSAGE);
    }
    return active;
  }

  getActiveCredentials(): CredentialSet {
    return toCredentialSet(this.getActive().config);
  }

  getActiveSummary(): string {
    const active = this.getActive();
    return (
      `Environment: ${active.name}\n` +
      `Host: ${active.config.host}\n` +
      `Description: ${formatDescription(active.config)}\n` +
      `Tags: ${formatTags(active.config)}\n` +
      `Activated: ${active.activatedAt.toISOString()}`
    );
  }

  listAll(): ReadonlyMap<string, EnvironmentConfig> {
    return this.requireSnapshot().configuration.environments;
  }

  private requireSnapshot(): Snapshot {
    if (!this.snapshot) {
      throw new PreconditionError(NOT_LOADED_MESSAGE);
    }
    return this.snapshot;
  }

  private activate(configuration: EnvironmentsConfiguration, name: string): ActiveEnvironment {
    const config = configuration.getEnvironment(name);
    if (!config) {
      throw new UnknownEnvironmentError(name, configuration.listEnvironmentNames());
    }
    return Object.freeze({ name, config, activatedAt: this.clock() });
  }

  private async prepareReload(structuredPath: string, legacyPath: string): Promise<PreparedReload> {
    const current = this.snapshot;
    if (!current) {
      throw new PreconditionError(NOT_LOADED_MESSAGE);
    }
    const resolved = await this.resolver(structuredPath, legacyPath);
    const configuration = resolved.configuration;
    this.logger.warn({ path: resolved.path }, `Configuration file changed, reloading: ${resolved.path}`);

    const previousActive = current.active?.name;
    if (previousActive === undefined) {
      return { resolved, fallback: false };
    }
    if (configuration.getEnvironment(previousActive)) {
      return { resolved, previousActive, active: this.activate(configuration, previousActive), fallback: false };
    }
    return { resolved, previousActive, active: this.activate(configuration, configuration.default), fallback: true };
  }

  // Runs once the outcome is settled; a failing audit sink is logged, not propagated.
  private recordAudit(event: EnvironmentAuditEvent): void {
    try {
      this.audit(event);
    } catch (error) {
      this.logger.error({ err: normalizeError(error), action: event.action }, "failed to record audit event");
    }
  }

  private exclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.mutationChain.then(task);
    this.mutationChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
