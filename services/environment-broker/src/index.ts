export * from "./config/errors.js";
export {
  EnvironmentConfigSchema,
  EnvironmentsDocumentSchema,
  TOKEN_PREFIX,
  createEnvironmentConfig,
  createEnvironmentsConfiguration,
  type EnvironmentConfig,
  type EnvironmentsConfiguration,
  type ProfileEnvironmentConfig,
  type TokenEnvironmentConfig,
} from "./config/schema.js";
export {
  LEGACY_VARIABLES,
  loadFromLegacy,
  loadFromStructured,
  resolveConfiguration,
  type ConfigSourceKind,
  type ResolvedConfiguration,
} from "./config/resolveConfig.js";
export { loadBrokerSettings, type BrokerSettings } from "./config/settings.js";
export {
  EnvironmentManager,
  type ActiveEnvironment,
  type EnvironmentState,
  type ReloadOutcome,
} from "./environments/EnvironmentManager.js";
export {
  checkCredentialsComplete,
  maskToken,
  redactCredentials,
  toCredentialSet,
  type CredentialCompleteness,
  type CredentialField,
  type CredentialSet,
} from "./environments/credentials.js";
export { ConfigWatcherService } from "./fs/ConfigWatcherService.js";
export { createEnvironmentTools, type EnvironmentTools, type ToolResult } from "./tools/environmentTools.js";
export { startEnvironmentRuntime, type EnvironmentRuntime } from "./runtime.js";
export { appLogger, createLogger, normalizeError, type AppLogger } from "./observability/logger.js";
export {
  logEnvironmentAudit,
  type AuditOutcome,
  type EnvironmentAuditAction,
  type EnvironmentAuditEvent,
} from "./observability/audit.js";
