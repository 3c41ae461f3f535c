#!/usr/bin/env node

import { runAgentCli } from "./agent.js";

runAgentCli(process.argv.slice(2)).then(code => {
  process.exitCode = code;
}, error => {
  console.error("Fatal error:", error);
  process.exit(2);
});
