import { execFile as execFileCallback } from "child_process";
import { promisify } from "util";
import { DEFAULT_TMUX_TIMEOUT_MS } from "./config.js";
import { debug } from "./debug.js";
import { TmuxTransportError } from "./errors.js";

const execFile = promisify(execFileCallback);

export interface TmuxSession {
  id: string;
  name: string;
  attached: boolean;
  windows: number;
}

/** `visible` is one screenful; `history` is the whole scrollback. */
export type CaptureScope = 'visible' | 'history';

export interface TransportOptions {
  tmuxBinary?: string;
  tmuxTimeoutMs?: number;
}

export interface TmuxResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// stderr from tmux when the target (or the whole server) is simply not there
const MISSING_TARGET_PATTERN = /can't find (session|window|pane)|session not found|no server running/i;

interface ExecFailure {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  message: string;
}

function readExecFailure(error: unknown): ExecFailure {
  if (!(error instanceof Error)) {
    return { exitCode: null, stdout: '', stderr: '', message: String(error) };
  }

  // execFile sets a numeric code for a non-zero exit, a string code such as
  // ENOENT when the binary could not be spawned, and killed/signal on timeout.
  const code = 'code' in error ? error.code : undefined;
  const killed = 'killed' in error && error.killed === true;
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';

  return {
    exitCode: typeof code === 'number' && !killed ? code : null,
    stdout,
    stderr,
    message: error.message
  };
}

/**
 * Run tmux with the given arguments. Resolves for any completed run, whatever
 * its exit status; rejects with TmuxTransportError only when tmux could not be
 * run to completion.
 */
export async function runTmux(args: readonly string[], options: TransportOptions = {}): Promise<TmuxResult> {
  const binary = options.tmuxBinary ?? 'tmux';
  debug('runTmux', binary, args);

  try {
    const { stdout, stderr } = await execFile(binary, args, {
      encoding: 'utf8',
      timeout: options.tmuxTimeoutMs ?? DEFAULT_TMUX_TIMEOUT_MS,
      maxBuffer: 64 * 1024 * 1024
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error: unknown) {
    const failure = readExecFailure(error);
    if (failure.exitCode === null) {
      throw new TmuxTransportError(
        `Failed to run ${binary} ${args[0] ?? ''}: ${failure.message}`,
        { args, exitCode: null, stderr: failure.stderr },
        { cause: error }
      );
    }
    debug('runTmux: non-zero exit', { args, exitCode: failure.exitCode, stderr: failure.stderr.trim() });
    return { exitCode: failure.exitCode, stdout: failure.stdout, stderr: failure.stderr };
  }
}

function exitFailure(result: TmuxResult, args: readonly string[]): TmuxTransportError {
  return new TmuxTransportError(
    `tmux ${args[0]} exited with code ${result.exitCode}: ${result.stderr.trim()}`,
    { args, exitCode: result.exitCode, stderr: result.stderr }
  );
}

function assertSucceeded(result: TmuxResult, args: readonly string[]): void {
  if (result.exitCode !== 0) {
    throw exitFailure(result, args);
  }
}

/**
 * Check whether a target is live. A missing session (or no server at all) is
 * `false`; any other tmux failure is a TmuxTransportError.
 */
export async function sessionExists(target: string, options: TransportOptions = {}): Promise<boolean> {
  const args = ['has-session', '-t', target];
  const result = await runTmux(args, options);

  if (result.exitCode === 0) {
    return true;
  }
  if (MISSING_TARGET_PATTERN.test(result.stderr)) {
    return false;
  }

  throw exitFailure(result, args);
}

/**
 * Type text into a pane literally, then optionally press Enter as a separate
 * key. Resolves once tmux has accepted the keys, not once the pane shows them.
 */
export async function sendKeys(
  target: string,
  text: string,
  submit: boolean,
  options: TransportOptions = {}
): Promise<void> {
  if (text) {
    const args = ['send-keys', '-t', target, '-l', '--', text];
    assertSucceeded(await runTmux(args, options), args);
  }

  if (submit) {
    const args = ['send-keys', '-t', target, 'Enter'];
    assertSucceeded(await runTmux(args, options), args);
  }
}

/**
 * Capture the rendered text of a pane. Wrapped lines are joined (-J) so a
 * long line is never split across rows. The result is raw: callers strip
 * escape sequences themselves.
 */
export async function capturePane(
  target: string,
  scope: CaptureScope,
  options: TransportOptions = {}
): Promise<string> {
  const args = ['capture-pane', '-p', '-J', '-t', target];
  if (scope === 'history') {
    args.push('-S', '-', '-E', '-');
  }

  const result = await runTmux(args, options);
  assertSucceeded(result, args);
  // tmux pads the capture with the pane's empty rows
  return result.stdout.trimEnd();
}

/**
 * List live session names in tmux's order; empty when no server is running.
 */
export async function listSessions(options: TransportOptions = {}): Promise<string[]> {
  const result = await runTmux(['list-sessions', '-F', '#{session_name}'], options);
  if (result.exitCode !== 0) {
    return [];
  }

  return result.stdout.split('\n').filter(name => name.length > 0);
}

/**
 * List live sessions with their id, attach state and window count.
 */
export async function listSessionDetails(options: TransportOptions = {}): Promise<TmuxSession[]> {
  const format = "#{session_id}:#{session_name}:#{?session_attached,1,0}:#{session_windows}";
  const result = await runTmux(['list-sessions', '-F', format], options);
  if (result.exitCode !== 0) {
    return [];
  }

  return result.stdout.split('\n').filter(line => line.length > 0).map(line => {
    const [id, name, attached, windows] = line.split(':');
    return {
      id,
      name,
      attached: attached === '1',
      windows: parseInt(windows, 10)
    };
  });
}
