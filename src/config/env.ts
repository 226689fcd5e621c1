import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

export const PLANNER_MODES = ["llm", "rules"] as const;

export type PlannerMode = (typeof PLANNER_MODES)[number];

export function isPlannerMode(value: string): value is PlannerMode {
  return PLANNER_MODES.some((mode) => mode === value);
}

const ENV_BOOLEAN_TRUE_VALUES = new Set(["1", "on", "true", "yes"]);
const ENV_BOOLEAN_FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);
const ENV_BOOLEAN_ALLOWED_VALUES = "true, false, 1, 0, yes, no, on, off, or empty string";

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((rawValue, context) => {
      if (rawValue === undefined) {
        return defaultValue;
      }

      const normalized = rawValue.trim().toLowerCase();
      if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
        return false;
      }

      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid boolean value "${rawValue}". Expected one of: ${ENV_BOOLEAN_ALLOWED_VALUES}.`,
      });
      return z.NEVER;
    });
}

function envInteger(defaultValue: number, min = 0) {
  return z.coerce.number().int().min(min).default(defaultValue);
}

function envList(defaultValue: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((raw) =>
      raw
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    );
}

const envSchema = z.object({
  PILOT_MODEL: z.string().min(1).default("openai/gpt-4.1"),
  PILOT_PLANNER: z.enum(PLANNER_MODES).default("llm"),
  PILOT_VISION_ENABLED: envBoolean(true),
  PILOT_PLAN_FIRST: envBoolean(true),
  PILOT_MAX_STEPS: envInteger(20, 1),
  PILOT_MAX_ITERATIONS: z.coerce.number().int().min(1).optional(),
  PILOT_CAPTURE_TIMEOUT_MS: envInteger(5000, 1),
  PILOT_REASONING_TIMEOUT_MS: envInteger(120000, 1),
  PILOT_REASONING_RETRIES: envInteger(2),
  PILOT_ACTION_TIMEOUT_MS: envInteger(30000, 1),
  PILOT_SETTLE_DELAY_MS: envInteger(300),
  PILOT_BATCH_SETTLE_DELAY_MS: envInteger(100),
  PILOT_PLANNER_BACKOFF_MS: envInteger(5000),
  PILOT_PLANNER_MAX_RETRIES: envInteger(5),
  PILOT_RECOVERY_ENABLED: envBoolean(true),
  PILOT_RECOVERY_MAX_ATTEMPTS: envInteger(3),
  PILOT_RECOVERY_USE_REASONING: envBoolean(true),
  PILOT_OVERLAY_DENYLIST: envList("atx,uiautomator,floating,悬浮"),
  PILOT_HOME_SCREEN_MARKERS: envList("launcher,com.miui.home,hotseat,workspace"),
  PILOT_SAFE_TOP_MARGIN: envInteger(150),
  PILOT_LOG_DIR: z.string().min(1).default("logs"),
  PILOT_RUN_DIR: z.string().min(1).default(".pilot/runs"),
  PILOT_API_PORT: envInteger(4000, 1),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  ADB_PATH: z.string().min(1).default("adb"),
  ADB_SERIAL: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined)),
});

export type PilotConfig = {
  model: string;
  planner: PlannerMode;
  visionEnabled: boolean;
  planFirst: boolean;
  maxSteps: number;
  maxIterations: number;
  timeouts: {
    captureMs: number;
    reasoningMs: number;
    actionMs: number;
  };
  reasoningRetries: number;
  settleDelayMs: number;
  batchSettleDelayMs: number;
  plannerBackoffMs: number;
  plannerMaxRetries: number;
  recovery: {
    enabled: boolean;
    maxAttemptsPerTarget: number;
    useReasoning: boolean;
  };
  overlayDenylist: string[];
  homeScreenMarkers: string[];
  safeTopMargin: number;
  logDir: string;
  runDir: string;
  apiPort: number;
  corsOrigin: string;
  adbPath: string;
  adbSerial?: string;
};

/**
 * Validates the environment and maps it onto the typed configuration.
 * Throws {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): PilotConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n${issues.join("\n")}`, issues);
  }

  const env = parsed.data;
  return {
    model: env.PILOT_MODEL,
    planner: env.PILOT_PLANNER,
    visionEnabled: env.PILOT_VISION_ENABLED,
    planFirst: env.PILOT_PLAN_FIRST,
    maxSteps: env.PILOT_MAX_STEPS,
    maxIterations: env.PILOT_MAX_ITERATIONS ?? env.PILOT_MAX_STEPS * 3,
    timeouts: {
      captureMs: env.PILOT_CAPTURE_TIMEOUT_MS,
      reasoningMs: env.PILOT_REASONING_TIMEOUT_MS,
      actionMs: env.PILOT_ACTION_TIMEOUT_MS,
    },
    reasoningRetries: env.PILOT_REASONING_RETRIES,
    settleDelayMs: env.PILOT_SETTLE_DELAY_MS,
    batchSettleDelayMs: env.PILOT_BATCH_SETTLE_DELAY_MS,
    plannerBackoffMs: env.PILOT_PLANNER_BACKOFF_MS,
    plannerMaxRetries: env.PILOT_PLANNER_MAX_RETRIES,
    recovery: {
      enabled: env.PILOT_RECOVERY_ENABLED,
      maxAttemptsPerTarget: env.PILOT_RECOVERY_MAX_ATTEMPTS,
      useReasoning: env.PILOT_RECOVERY_USE_REASONING,
    },
    overlayDenylist: env.PILOT_OVERLAY_DENYLIST,
    homeScreenMarkers: env.PILOT_HOME_SCREEN_MARKERS,
    safeTopMargin: env.PILOT_SAFE_TOP_MARGIN,
    logDir: env.PILOT_LOG_DIR,
    runDir: env.PILOT_RUN_DIR,
    apiPort: env.PILOT_API_PORT,
    corsOrigin: env.CORS_ORIGIN,
    adbPath: env.ADB_PATH,
    adbSerial: env.ADB_SERIAL,
  };
}
