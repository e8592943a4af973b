#!/usr/bin/env node
/**
 * @cardflow/cli: Entry point.
 *
 * Reads configuration from the environment, like the server, and runs
 * one command against the configured store.
 */

import chalk from "chalk";
import { runCli } from "./commands.js";

process.exitCode = runCli(process.argv.slice(2), {
  env: process.env,
  printer: {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    chalk,
  },
});
