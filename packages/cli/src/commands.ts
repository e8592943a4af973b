/**
 * @cardflow/cli: Commands.
 *
 * Every command works on the domain packages directly (no HTTP server)
 * through the same CashflowService the server uses.
 */

import { Command, CommanderError } from "commander";
import { ZodError } from "zod";
import { LedgerError } from "@cardflow/ledger";
import type { LedgerStore } from "@cardflow/store";
import { StoreError } from "@cardflow/store";
import type { TimelineEventKind } from "@cardflow/reports";
import type { AppConfig, CashflowService } from "@cardflow/node";
import { createService, loadConfig, openStore } from "@cardflow/node";
import type { Printer } from "./render.js";
import { fail, ok, printBalance, printSheet, printTimeline, warn } from "./render.js";

export const USAGE = [
  "Usage: cardflow <command> [options]",
  "",
  "Commands:",
  "  provision-admin [--name <name>]        Create the admin operator from ADMIN_NAME / ADMIN_API_KEY",
  "  sheet [--date d] [--bank b] [--q text]  Print the daily withdrawal sheet",
  "  timeline <cardId> [--start d] [--end d] [--kind transaction|withdrawal] [--q text]",
  "  balance <cardId> [--date d]             Print carried, received and should-have for a day",
];

/** Exit codes: 0 done, 1 refused by the ledger, 2 bad invocation. */
export type ExitCode = 0 | 1 | 2;

export interface RunOptions {
  readonly env: Record<string, string | undefined>;
  readonly printer: Printer;
  /** Store factory; defaults to the one the server uses */
  readonly openStore?: ((config: AppConfig) => LedgerStore) | undefined;
}

interface CommandContext {
  readonly config: AppConfig;
  readonly service: CashflowService;
  readonly printer: Printer;
}

type AdminFlags = { name?: string };
type SheetFlags = { date?: string; bank?: string; q?: string };
type TimelineFlags = { start?: string; end?: string; kind?: string; q?: string };
type BalanceFlags = { date?: string };

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// =============================================================================
// Commands
// =============================================================================

function provisionAdmin({ config, service, printer }: CommandContext, flags: AdminFlags): ExitCode {
  const name = (flags.name ?? config.ADMIN_NAME ?? "").trim();
  const apiKey = config.ADMIN_API_KEY ?? "";
  if (name === "" || apiKey.trim() === "") {
    throw new UsageError("ADMIN_NAME (or --name) and ADMIN_API_KEY must be set");
  }
  if (config.DATA_FILE === undefined) {
    warn(printer, "DATA_FILE is not set; the operator will not outlive this process");
  }

  const { record, created } = service.provisionAdmin(name, apiKey);
  if (created) {
    ok(printer, `Admin "${record.name}" provisioned`);
  } else {
    warn(printer, `Admin "${record.name}" already exists; nothing changed`);
  }
  return 0;
}

function sheet({ service, printer }: CommandContext, flags: SheetFlags): ExitCode {
  printSheet(printer, service.dailySheet({ date: flags.date, bank: flags.bank, q: flags.q }));
  return 0;
}

function timeline({ service, printer }: CommandContext, rawId: string, flags: TimelineFlags): ExitCode {
  const cardId = readCardId(rawId);
  const kind = readKind(flags.kind);
  const view = service.getCard(cardId);
  const result = service.cardTimeline(cardId, { start: flags.start, end: flags.end, kind, q: flags.q });
  printTimeline(printer, view.label, result, service.zone);
  return 0;
}

function balance({ service, printer }: CommandContext, rawId: string, flags: BalanceFlags): ExitCode {
  const cardId = readCardId(rawId);
  const view = service.getCard(cardId);
  printBalance(printer, view.label, service.cardBalance(cardId, flags.date));
  return 0;
}

// =============================================================================
// Program
// =============================================================================

function writeLines(write: (line: string) => void): (str: string) => void {
  return (str) => {
    for (const line of str.replace(/\n$/, "").split("\n")) {
      write(line);
    }
  };
}

/**
 * Build the commander program. Each command stores its exit code in
 * `result.code`; parse failures and help surface as CommanderError.
 */
function buildProgram(options: RunOptions, result: { code: ExitCode }): Command {
  const { printer } = options;
  const context = (): CommandContext => {
    const config = loadConfig(options.env);
    const store = (options.openStore ?? openStore)(config);
    return { config, service: createService(config, store), printer };
  };

  const program = new Command()
    .name("cardflow")
    .exitOverride()
    .showSuggestionAfterError(false)
    .configureHelp({ formatHelp: () => `${USAGE.join("\n")}\n` })
    .configureOutput({
      writeOut: writeLines(printer.out),
      writeErr: writeLines(printer.err),
      // reported once by runCli
      outputError: () => undefined,
    });

  program
    .command("provision-admin")
    .option("--name <name>")
    .action((flags: AdminFlags) => {
      result.code = provisionAdmin(context(), flags);
    });

  program
    .command("sheet")
    .option("--date <date>")
    .option("--bank <bank>")
    .option("--q <text>")
    .action((flags: SheetFlags) => {
      result.code = sheet(context(), flags);
    });

  program
    .command("timeline")
    .argument("<cardId>")
    .option("--start <date>")
    .option("--end <date>")
    .option("--kind <kind>")
    .option("--q <text>")
    .action((cardId: string, flags: TimelineFlags) => {
      result.code = timeline(context(), cardId, flags);
    });

  program
    .command("balance")
    .argument("<cardId>")
    .option("--date <date>")
    .action((cardId: string, flags: BalanceFlags) => {
      result.code = balance(context(), cardId, flags);
    });

  return program;
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Run one CLI invocation. Never throws for expected failures; the
 * returned code says how it went.
 */
export function runCli(argv: readonly string[], options: RunOptions): ExitCode {
  const { printer } = options;
  if (argv.length === 0) {
    for (const line of USAGE) {
      printer.out(line);
    }
    return 0;
  }

  const result: { code: ExitCode } = { code: 0 };
  try {
    buildProgram(options, result).parse([...argv], { from: "user" });
    return result.code;
  } catch (err) {
    return report(printer, err);
  }
}

function report(printer: Printer, err: unknown): ExitCode {
  if (err instanceof CommanderError) {
    if (err.code === "commander.helpDisplayed") {
      return 0;
    }
    fail(printer, err.message.replace(/^error: /, ""));
    return 2;
  }
  if (err instanceof UsageError) {
    fail(printer, err.message);
    return 2;
  }
  if (err instanceof ZodError) {
    for (const issue of err.issues) {
      fail(printer, `${issue.path.join(".")}: ${issue.message}`);
    }
    return 2;
  }
  if (err instanceof LedgerError || err instanceof StoreError) {
    fail(printer, err.message);
    return 1;
  }
  throw err;
}

function readCardId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : 0;
  if (id <= 0) {
    throw new UsageError(`Card id must be a positive integer, got "${raw}"`);
  }
  return id;
}

function readKind(raw: string | undefined): TimelineEventKind | undefined {
  if (raw === undefined || raw === "transaction" || raw === "withdrawal") {
    return raw;
  }
  throw new UsageError(`--kind must be "transaction" or "withdrawal", got "${raw}"`);
}
