import { v4 as uuidv4 } from "uuid";
import { stripAnsi } from "./ansi.js";
import { debug } from "./debug.js";
import { CommandTimeoutError } from "./errors.js";
import { capturePane, sendKeys, type TransportOptions } from "./tmux.js";

export const MARKER_PREFIX = '__TMUX_BRIDGE';

export interface Marker {
  id: string;
  start: string;
  end: string;
}

/**
 * A fresh start/end pair for one command. The id is the 32 hex digits of a
 * random UUID v4 (122 random bits), so controllers pointed at the same pane
 * never need to coordinate.
 */
export function createMarker(id: string = uuidv4().replace(/-/g, '')): Marker {
  return {
    id,
    start: `${MARKER_PREFIX}_START_${id}__`,
    end: `${MARKER_PREFIX}_END_${id}__`
  };
}

/**
 * One shell line that prints the start marker, runs the command verbatim and
 * prints the end marker. The markers are single-quoted, so the shell's echo of
 * this line never has a marker standing alone on a row.
 *
 * Trailing `;` separators are dropped, but an escaped `\;` (as in
 * `find -exec ... \;`) is part of the command and stays. A command that ends
 * in a `#` comment also comments out the end marker, so such a call can only
 * time out.
 */
export function buildWrappedCommand(command: string, marker: Marker): string {
  let body = command.trimEnd();
  while (body.endsWith(';') && !body.endsWith('\\;')) {
    body = body.slice(0, -1).trimEnd();
  }
  if (!body) {
    return `echo '${marker.start}'; echo '${marker.end}'`;
  }
  // `cmd &` already terminates the statement; `cmd &;` would be a syntax error
  const separator = /(^|[^&])&$/.test(body) ? ' ' : '; ';
  return `echo '${marker.start}'; ${body}${separator}echo '${marker.end}'`;
}

export type MarkerScan =
  | { state: 'pending' }
  | { state: 'matched'; startLine: number; endLine: number }
  | { state: 'start-marker-lost'; endLine: number };

/**
 * Find the marker block in normalized pane lines. A marker only counts when it
 * is the whole (trimmed) line, i.e. the output of `echo`, not text inside
 * another line.
 */
export function findMarkerBlock(lines: readonly string[], marker: Marker): MarkerScan {
  let startLine = -1;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (startLine < 0) {
      if (line === marker.start) {
        startLine = i;
      } else if (line === marker.end) {
        return { state: 'start-marker-lost', endLine: i };
      }
    } else if (line === marker.end) {
      return { state: 'matched', startLine, endLine: i };
    }
  }

  return { state: 'pending' };
}

// The command alone on the line, or right after a prompt such as `$ ` or `# `.
function isCommandEcho(line: string, command: string): boolean {
  const echoed = command.trim();
  const trimmed = line.trim();
  if (!echoed || !trimmed.endsWith(echoed)) {
    return false;
  }
  const prefix = trimmed.slice(0, trimmed.length - echoed.length);
  return prefix === '' || /[$#%>]\s*$/.test(prefix);
}

/**
 * Lines strictly between the markers, without the shell's echo of the command
 * and without any line that still carries marker text.
 */
export function extractOutput(
  lines: readonly string[],
  block: { startLine: number; endLine: number },
  command: string,
  marker: Marker
): string {
  const inner = lines.slice(block.startLine + 1, block.endLine);

  if (inner.length && isCommandEcho(inner[0], command)) {
    inner.shift();
  }

  return inner
    .filter(line => !line.includes(marker.start) && !line.includes(marker.end))
    .join('\n');
}

export interface PollClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PollClock = {
  now: () => Date.now(),
  sleep: ms => new Promise<void>(resolve => setTimeout(resolve, ms))
};

export interface ExecuteOptions extends TransportOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  clock?: PollClock;
}

/**
 * Send `command` wrapped in fresh markers and poll the pane's full history
 * until the end marker shows up after the start marker.
 *
 * Rejects with CommandTimeoutError when the deadline (counted from the send)
 * passes, or as soon as the end marker is seen without its start marker. The
 * command itself is never interrupted.
 */
export async function executeAndWait(target: string, command: string, options: ExecuteOptions): Promise<string> {
  const { timeoutMs, pollIntervalMs, clock = systemClock } = options;
  const marker = createMarker();
  const wrapped = buildWrappedCommand(command, marker);

  const submittedAt = clock.now();
  await sendKeys(target, wrapped, true, options);
  debug('executeAndWait: submitted', { target, markerId: marker.id, wrapped });

  for (let attempt = 1; ; attempt++) {
    const lines = stripAnsi(await capturePane(target, 'history', options)).split('\n');
    const scan = findMarkerBlock(lines, marker);

    if (scan.state === 'matched') {
      debug('executeAndWait: matched', { markerId: marker.id, attempt, startLine: scan.startLine, endLine: scan.endLine });
      return extractOutput(lines, scan, command, marker);
    }

    if (scan.state === 'start-marker-lost') {
      debug('executeAndWait: start marker missing', { markerId: marker.id, endLine: scan.endLine });
      throw new CommandTimeoutError(command, timeoutMs, 'start-marker-lost');
    }

    const elapsed = clock.now() - submittedAt;
    if (elapsed >= timeoutMs) {
      debug('executeAndWait: timed out', { markerId: marker.id, attempt, elapsed });
      throw new CommandTimeoutError(command, timeoutMs, 'deadline');
    }

    debug('executeAndWait: polling', { markerId: marker.id, attempt, elapsed });
    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed));
  }
}
