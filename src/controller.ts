import { z } from "zod";
import { stripAnsi } from "./ansi.js";
import { formatIssues, parseConfig, type BridgeConfig, type BridgeConfigInput } from "./config.js";
import { debug } from "./debug.js";
import { CommandInFlightError, ConfigError, SessionNotFoundError } from "./errors.js";
import { executeAndWait, systemClock, type PollClock } from "./markers.js";
import * as tmux from "./tmux.js";

export interface ControllerOptions extends BridgeConfigInput {
  clock?: PollClock;
}

export interface ExecuteCallOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

const executeCallSchema = z.object({
  timeoutMs: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().optional()
});

const lineCountSchema = z.number().int().positive().optional();

/**
 * Drives one tmux target (`session`, `session:window` or
 * `session:window.pane`) that a human created and may still be typing into.
 *
 * At most one executeAndWait is in flight per controller. Callers sharing a
 * target across controllers or processes must keep their calls in order
 * themselves: tmux offers no lock, and interleaved keystrokes end up inside the
 * extracted output.
 */
export class TmuxController {
  readonly target: string;
  readonly config: BridgeConfig;
  private readonly clock: PollClock;
  private inFlight = false;

  private constructor(target: string, config: BridgeConfig, clock: PollClock) {
    this.target = target;
    this.config = config;
    this.clock = clock;
  }

  /**
   * Validate the options and the target, then return a controller for it.
   * Rejects with SessionNotFoundError when tmux reports no such target.
   */
  static async connect(target: string, options: ControllerOptions = {}): Promise<TmuxController> {
    const { clock = systemClock, ...input } = options;
    const config = parseConfig(input);

    if (!await tmux.sessionExists(target, config)) {
      throw new SessionNotFoundError(target);
    }

    debug('TmuxController.connect', { target, config });
    return new TmuxController(target, config, clock);
  }

  static listSessions(options: tmux.TransportOptions = {}): Promise<string[]> {
    return tmux.listSessions(options);
  }

  get sessionName(): string {
    return this.target.split(':')[0];
  }

  /**
   * Run a shell command in the pane and resolve with its output once it has
   * finished. Per-call options override the controller defaults.
   */
  async executeAndWait(command: string, options: ExecuteCallOptions = {}): Promise<string> {
    const parsed = executeCallSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigError(`Invalid executeAndWait options: ${formatIssues(parsed.error)}`);
    }

    if (this.inFlight) {
      throw new CommandInFlightError(this.target);
    }

    this.inFlight = true;
    try {
      return await executeAndWait(this.target, command, {
        ...this.config,
        timeoutMs: parsed.data.timeoutMs ?? this.config.timeoutMs,
        pollIntervalMs: parsed.data.pollIntervalMs ?? this.config.pollIntervalMs,
        clock: this.clock
      });
    } finally {
      this.inFlight = false;
    }
  }

  /** Type into the pane without waiting for anything to finish. */
  sendKeys(text: string, enter = true): Promise<void> {
    return tmux.sendKeys(this.target, text, enter, this.config);
  }

  /**
   * The visible region of the pane, escape sequences stripped; with `lines`,
   * only its last `lines` lines.
   */
  async readBuffer(lines?: number): Promise<string> {
    if (!lineCountSchema.safeParse(lines).success) {
      throw new ConfigError(`lines must be a positive integer, got ${lines}`);
    }

    const content = stripAnsi(await tmux.capturePane(this.target, 'visible', this.config));
    if (lines === undefined) {
      return content;
    }

    return content.split('\n').slice(-lines).join('\n');
  }
}
