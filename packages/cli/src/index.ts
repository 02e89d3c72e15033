/**
 * tern CLI entry point
 *
 * @module cli
 */

import { runCli } from "./program.js";

// Ctrl+C outside a prompt
process.once("SIGINT", () => {
  process.exit(130);
});

process.exitCode = await runCli(process.argv);
