// Enable by setting env TMUX_BRIDGE_DEBUG=1 when launching the server or agent
const DEBUG_ENABLED = process.env.TMUX_BRIDGE_DEBUG === '1';

export function debug(...args: unknown[]): void {
  if (DEBUG_ENABLED) {
    // stderr to avoid interfering with MCP stdio and captured pane content
    console.error('[tmux-bridge-debug]', ...args);
  }
}
