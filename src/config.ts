import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_POLL_INTERVAL_MS = 150;
export const DEFAULT_TMUX_TIMEOUT_MS = 5000;

export const bridgeConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS)
    .describe("Deadline for executeAndWait, measured from the moment the command is sent"),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS)
    .describe("Sleep between pane captures while waiting for the end marker"),
  tmuxTimeoutMs: z.number().int().positive().default(DEFAULT_TMUX_TIMEOUT_MS)
    .describe("OS-level timeout for a single tmux process"),
  tmuxBinary: z.string().min(1).default("tmux")
    .describe("tmux executable, looked up on PATH unless absolute")
});

export type BridgeConfig = z.output<typeof bridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;

const millis = z.string().trim().regex(/^\d+$/, "expected a whole number of milliseconds").transform(Number);

const envSchema = z.object({
  TMUX_BRIDGE_TIMEOUT_MS: millis.optional(),
  TMUX_BRIDGE_POLL_INTERVAL_MS: millis.optional(),
  TMUX_BRIDGE_TMUX_TIMEOUT_MS: millis.optional(),
  TMUX_BRIDGE_TMUX_BINARY: z.string().min(1).optional()
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseConfig(input: BridgeConfigInput = {}): BridgeConfig {
  const parsed = bridgeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid tmux-bridge options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Build the effective configuration from TMUX_BRIDGE_* environment variables,
 * with explicit overrides taking precedence over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: BridgeConfigInput = {}
): BridgeConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }

  const fromEnv = parsedEnv.data;
  // zod applies defaults for keys left undefined
  return parseConfig({
    timeoutMs: overrides.timeoutMs ?? fromEnv.TMUX_BRIDGE_TIMEOUT_MS,
    pollIntervalMs: overrides.pollIntervalMs ?? fromEnv.TMUX_BRIDGE_POLL_INTERVAL_MS,
    tmuxTimeoutMs: overrides.tmuxTimeoutMs ?? fromEnv.TMUX_BRIDGE_TMUX_TIMEOUT_MS,
    tmuxBinary: overrides.tmuxBinary ?? fromEnv.TMUX_BRIDGE_TMUX_BINARY
  });
}
