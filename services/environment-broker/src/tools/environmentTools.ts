import { z } from "zod";

import { isEnvironmentConfigError, UnknownEnvironmentError, type EnvironmentErrorCode } from "../config/errors.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import type { EnvironmentManager } from "../environments/EnvironmentManager.js";

export type ToolFailure = {
  code: EnvironmentErrorCode | "invalid_input";
  message: string;
  available?: string[];
};

export type ToolResult = { ok: true; message: string } | { ok: false; error: ToolFailure };

export const SwitchEnvironmentInputSchema = z.object({
  name: z.string().trim().min(1, "Environment name is required"),
});
export type SwitchEnvironmentInput = z.infer<typeof SwitchEnvironmentInputSchema>;

const CONFIG_HINT = "Please ensure your environments.yaml or .env file is properly configured.";

export interface EnvironmentTools {
  switchEnvironment(input: unknown): Promise<ToolResult>;
  describeEnvironment(): Promise<ToolResult>;
}

/**
 * Caller-facing operations for switching and describing the active
 * environment. Known failures become `{ ok: false }` results; anything else
 * is a defect and propagates.
 */
export function createEnvironmentTools(manager: EnvironmentManager): EnvironmentTools {
  const logger = appLogger.child({ component: "environment-tools" });

  return {
    async switchEnvironment(input: unknown): Promise<ToolResult> {
      const parsed = SwitchEnvironmentInputSchema.safeParse(input);
      if (!parsed.success) {
        const message = parsed.error.issues.map(issue => issue.message).join("; ");
        return { ok: false, error: { code: "invalid_input", message } };
      }
      try {
        const message = await manager.switchTo(parsed.data.name);
        return { ok: true, message };
      } catch (error) {
        if (!isEnvironmentConfigError(error)) {
          throw error;
        }
        logger.error({ err: normalizeError(error) }, "Failed to switch environment");
        const failure: ToolFailure = { code: error.code, message: error.message };
        if (error instanceof UnknownEnvironmentError) {
          failure.available = [...error.available];
        }
        return { ok: false, error: failure };
      }
    },

    async describeEnvironment(): Promise<ToolResult> {
      try {
        return { ok: true, message: manager.getActiveSummary() };
      } catch (error) {
        if (!isEnvironmentConfigError(error)) {
          throw error;
        }
        logger.error({ err: normalizeError(error) }, "Failed to get current environment");
        return {
          ok: false,
          error: {
            code: error.code,
            message: `Error getting current environment: ${error.message}\n${CONFIG_HINT}`,
          },
        };
      }
    },
  };
}
