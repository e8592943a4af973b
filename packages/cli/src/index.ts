/**
 * @cardflow/cli: Operator command line.
 *
 * provision-admin, sheet, timeline and balance over the same service the
 * HTTP server uses. The executable entry point is main.ts.
 */

export { runCli, USAGE } from "./commands.js";
export type { ExitCode, RunOptions } from "./commands.js";
export { printBalance, printSheet, printTimeline } from "./render.js";
export type { Printer } from "./render.js";
