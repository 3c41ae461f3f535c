// Example agent: runs a few commands in a tmux session a human has already
// opened (and possibly ssh'd somewhere from).
//
//   tmux new -s myserver          # terminal B
//   tmux-bridge-agent myserver    # terminal A
//
// The bin is agent-cli.ts.

import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { TmuxController, type ControllerOptions } from "./controller.js";
import { CommandTimeoutError, SessionNotFoundError } from "./errors.js";

export const DEFAULT_SESSION = "myserver";

export interface AgentOutput {
  log(message: string): void;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof SessionNotFoundError || error instanceof CommandTimeoutError) {
    return 1;
  }
  return 2;
}

async function drive(sessionName: string, out: AgentOutput, options: ControllerOptions): Promise<void> {
  out.log(`[*] Connecting to tmux session '${sessionName}' ...`);
  const ctrl = await TmuxController.connect(sessionName, options);
  const sessions = await TmuxController.listSessions(ctrl.config);
  out.log(`[+] Connected.  Available sessions: ${sessions.join(", ")}`);

  out.log("\n[*] Executing: ls -la");
  const listing = await ctrl.executeAndWait("ls -la");
  out.log("--- output ---");
  out.log(listing);
  out.log("--- end ---");

  const entries = listing
    .split("\n")
    .filter(line => line.trim() && !line.startsWith("total"));
  out.log(`\n[+] Number of entries (including . and ..): ${entries.length}`);

  for (const command of ["whoami", "hostname"]) {
    out.log(`\n[*] Executing: ${command}`);
    const result = await ctrl.executeAndWait(command);
    out.log(`    => ${result.trim()}`);
  }

  out.log("\n[*] Current visible buffer (last 5 lines):");
  const visible = await ctrl.readBuffer(5);
  for (const line of visible.split("\n")) {
    out.log(`    | ${line}`);
  }

  out.log("\n[*] Sending an empty keystroke without Enter ...");
  await ctrl.sendKeys("", false);
  out.log("[+] Done.");
}

/**
 * Run the example against `sessionName` and resolve with the process exit
 * code: 0 on success, 1 for a missing session or a timed-out command, 2 for
 * anything else.
 */
export async function runAgent(
  sessionName: string,
  out: AgentOutput = console,
  options: ControllerOptions = {}
): Promise<number> {
  try {
    await drive(sessionName, out, options);
    return 0;
  } catch (error) {
    out.log(`[!] ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof CommandTimeoutError) {
      out.log("    The command may still be running in the pane.");
    }
    return exitCodeFor(error);
  }
}

/**
 * Entry point for the `tmux-bridge-agent` bin: `[session] [--timeout ms]`.
 * Resolves with the exit code instead of exiting.
 */
export async function runAgentCli(argv: string[], out: AgentOutput = console): Promise<number> {
  let sessionName: string;
  let options: ControllerOptions;
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'timeout': { type: 'string', short: 't' }
      }
    });

    sessionName = positionals[0] ?? DEFAULT_SESSION;
    options = loadConfig(process.env, {
      timeoutMs: values['timeout'] === undefined ? undefined : Number(values['timeout'])
    });
  } catch (error) {
    out.log(`[!] ${error instanceof Error ? error.message : String(error)}`);
    return exitCodeFor(error);
  }

  return runAgent(sessionName, out, options);
}
