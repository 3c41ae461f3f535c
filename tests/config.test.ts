/// <reference types="vitest" />

import { describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("config", () => {
  it("fills in defaults", () => {
    expect(parseConfig()).toEqual({
      timeoutMs: 10000,
      pollIntervalMs: 150,
      tmuxTimeoutMs: 5000,
      tmuxBinary: 'tmux'
    });
  });

  it("rejects non-positive and fractional durations", () => {
    expect(() => parseConfig({ timeoutMs: 0 })).toThrow(ConfigError);
    expect(() => parseConfig({ pollIntervalMs: 2.5 })).toThrow(ConfigError);
  });

  it("names the offending option", () => {
    expect(() => parseConfig({ timeoutMs: -5 })).toThrow(/^Invalid tmux-bridge options: timeoutMs: /);
  });

  it("reads TMUX_BRIDGE_* variables", () => {
    const config = loadConfig({
      TMUX_BRIDGE_TIMEOUT_MS: '30000',
      TMUX_BRIDGE_POLL_INTERVAL_MS: ' 250 ',
      TMUX_BRIDGE_TMUX_BINARY: '/usr/bin/tmux',
      PATH: '/usr/bin'
    });

    expect(config).toEqual({
      timeoutMs: 30000,
      pollIntervalMs: 250,
      tmuxTimeoutMs: 5000,
      tmuxBinary: '/usr/bin/tmux'
    });
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadConfig({ TMUX_BRIDGE_TIMEOUT_MS: '30000' }, { timeoutMs: 2000, tmuxTimeoutMs: undefined });

    expect(config.timeoutMs).toBe(2000);
    expect(config.tmuxTimeoutMs).toBe(5000);
  });

  it("rejects malformed environment values", () => {
    expect(() => loadConfig({ TMUX_BRIDGE_POLL_INTERVAL_MS: 'fast' }))
      .toThrow("Invalid environment: TMUX_BRIDGE_POLL_INTERVAL_MS: expected a whole number of milliseconds");
  });

  it("rejects an overridden value that is not a number", () => {
    expect(() => loadConfig({}, { timeoutMs: Number('soon') })).toThrow(ConfigError);
  });
});
