export class TmuxBridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * tmux could not be run at all (missing binary, OS-level timeout, signal), or
 * it exited non-zero for a reason other than a missing session.
 */
export class TmuxTransportError extends TmuxBridgeError {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    details: { args: readonly string[]; exitCode: number | null; stderr: string },
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class SessionNotFoundError extends TmuxBridgeError {
  readonly target: string;

  constructor(target: string) {
    const session = target.split(':')[0];
    super(
      `tmux target '${target}' does not exist. ` +
      `Create it first, e.g. run 'tmux new -s ${session}' in another terminal.`
    );
    this.target = target;
  }
}

export type TimeoutReason = 'deadline' | 'start-marker-lost';

export class CommandTimeoutError extends TmuxBridgeError {
  readonly command: string;
  readonly timeoutMs: number;
  readonly reason: TimeoutReason;

  constructor(command: string, timeoutMs: number, reason: TimeoutReason) {
    super(
      reason === 'deadline'
        ? `Command did not finish within ${timeoutMs}ms: ${command}`
        : `End marker seen without its start marker (scrollback truncated?): ${command}`
    );
    this.command = command;
    this.timeoutMs = timeoutMs;
    this.reason = reason;
  }
}

export class CommandInFlightError extends TmuxBridgeError {
  readonly target: string;

  constructor(target: string) {
    super(`Another command is still running on '${target}'; wait for it before sending the next one`);
    this.target = target;
  }
}

export class ConfigError extends TmuxBridgeError {}
