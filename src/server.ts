import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { BridgeConfig } from "./config.js";
import { TmuxController } from "./controller.js";
import * as tmux from "./tmux.js";

export interface ServerOptions {
  version: string;
  config: BridgeConfig;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

function errorResult(action: string, error: unknown) {
  return {
    content: [{
      type: "text" as const,
      text: `Error ${action}: ${describeError(error)}`
    }],
    isError: true
  };
}

/**
 * Build the MCP server exposing a TmuxController per target. Controllers are
 * created on first use and kept for the lifetime of the server.
 */
export function createServer({ version, config }: ServerOptions): McpServer {
  const server = new McpServer({
    name: "tmux-bridge",
    version
  }, {
    capabilities: {
      resources: {},
      tools: {},
      logging: {}
    }
  });

  const controllers = new Map<string, TmuxController>();

  async function controllerFor(target: string): Promise<TmuxController> {
    const existing = controllers.get(target);
    if (existing) {
      return existing;
    }
    const controller = await TmuxController.connect(target, config);
    controllers.set(target, controller);
    return controller;
  }

  const targetSchema = z.string().min(1).describe("tmux target: session, session:window or session:window.pane");

  server.tool(
    "list-sessions",
    "List the names of all live tmux sessions",
    {},
    async () => {
      try {
        const sessions = await TmuxController.listSessions(config);
        return {
          content: [{
            type: "text",
            text: JSON.stringify(sessions, null, 2)
          }]
        };
      } catch (error) {
        return errorResult("listing tmux sessions", error);
      }
    }
  );

  server.tool(
    "execute-and-wait",
    "Run a shell command in an existing tmux pane and return its output once it has finished. Only one command per target may be in flight. The command is not interrupted on timeout.",
    {
      target: targetSchema,
      command: z.string().describe("Shell command, run verbatim on a single line"),
      timeoutMs: z.number().int().positive().optional().describe(`Maximum milliseconds to wait (default ${config.timeoutMs})`),
      pollIntervalMs: z.number().int().positive().optional().describe(`Milliseconds between pane captures (default ${config.pollIntervalMs})`)
    },
    async ({ target, command, timeoutMs, pollIntervalMs }) => {
      try {
        const controller = await controllerFor(target);
        const output = await controller.executeAndWait(command, { timeoutMs, pollIntervalMs });
        return {
          content: [{
            type: "text",
            text: output
          }]
        };
      } catch (error) {
        return errorResult("executing command", error);
      }
    }
  );

  server.tool(
    "send-keys",
    "Type text into a tmux pane without waiting for completion, e.g. answers to prompts or input for interactive programs",
    {
      target: targetSchema,
      text: z.string().describe("Text sent literally"),
      enter: z.boolean().optional().describe("Press Enter after the text (default true)")
    },
    async ({ target, text, enter }) => {
      try {
        const controller = await controllerFor(target);
        await controller.sendKeys(text, enter ?? true);
        return {
          content: [{
            type: "text",
            text: enter === false ? `Keys sent to ${target} without Enter` : `Keys sent to ${target}`
          }]
        };
      } catch (error) {
        return errorResult("sending keys", error);
      }
    }
  );

  server.tool(
    "read-buffer",
    "Read the visible region of a tmux pane as plain text",
    {
      target: targetSchema,
      lines: z.number().int().positive().optional().describe("Return only the last N lines")
    },
    async ({ target, lines }) => {
      try {
        const controller = await controllerFor(target);
        const content = await controller.readBuffer(lines);
        return {
          content: [{
            type: "text",
            text: content || "No content captured"
          }]
        };
      } catch (error) {
        return errorResult("reading buffer", error);
      }
    }
  );

  server.resource(
    "Tmux Sessions",
    "tmux://sessions",
    async (uri) => {
      try {
        const sessions = await tmux.listSessionDetails(config);
        return {
          contents: [{
            uri: uri.href,
            text: JSON.stringify(sessions, null, 2)
          }]
        };
      } catch (error) {
        return {
          contents: [{
            uri: uri.href,
            text: `Error listing tmux sessions: ${describeError(error)}`
          }]
        };
      }
    }
  );

  return server;
}
