/**
 * calsel command definitions
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  encodeIndexText,
  formatRules,
  indexColumns,
  logger,
  openCalibrationStore,
  parseRules,
  toText,
  type CalibrationStore,
  type TimePolicy,
} from "@calsel/sdk";
import { resolveDataDir, resolveRulesPath } from "./lib/env.js";
import { parsePolicy, parseTypeName } from "./lib/arg.js";
import { processIo, readHeader, type CliIo, type HeaderInputOptions } from "./lib/io.js";
import {
  colorize,
  describeVerification,
  formatJson,
  formatLines,
  recordToJson,
  rejectionLines,
  selectionToJson,
} from "./lib/render.js";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface GlobalOptions {
  rulesPath?: string;
  dataDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface SelectCommandOptions extends HeaderInputOptions {
  policy?: TimePolicy;
  json?: boolean;
}

interface ListCommandOptions {
  json?: boolean;
}

/**
 * Exit status set by commands that finish without throwing
 */
export interface RunState {
  exitCode: number;
}

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return String(parsed.version);
  }
  return "0.0.0";
}

function addHeaderOptions(command: Command): Command {
  return command
    .option("--header <json>", "Reference header as inline JSON")
    .option("--header-file <path>", "Read the reference header from a JSON file");
}

/**
 * Build the command tree
 * @param io - Streams for output and header input
 * @param state - Receives the exit status of commands that report "none" without failing
 */
export function createProgram(io: CliIo = processIo, state: RunState = { exitCode: 0 }): Command {
  const program = new Command();

  // Settings are inherited by subcommands, so configure before adding them
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", process.stderr)),
    })
    .exitOverride((err) => {
      throw new CliError(err.message, { exitCode: err.exitCode, cause: err, reported: true });
    });

  program
    .name("calsel")
    .description("Select calibration frames by header rules")
    .version(readVersion())
    .option("--rules-path <dirs>", "Directories searched for rules.<type> files")
    .option("--data-dir <dir>", "Directory holding index files")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const openStore = (): CalibrationStore => {
    const opts = globals();
    return openCalibrationStore({
      rulesPath: resolveRulesPath(opts.rulesPath),
      dataDir: resolveDataDir(opts.dataDir),
    });
  };

  program.hook("preAction", () => {
    const opts = globals();
    if (opts.verbose) {
      logger.setLevel("debug");
    } else if (opts.quiet) {
      logger.setLevel("error");
    }
  });

  // rules check
  const rules = program.command("rules").description("Rule file tools");
  rules
    .command("check")
    .description("Parse a rule file and print the normalized rules")
    .argument("<file>", "Rule file")
    .action(async (file: string) => {
      await withTiming(
        "cli.rules.check",
        async () => {
          let text: string;
          try {
            text = await fs.readFile(file, "utf8");
          } catch (err) {
            throw new CliError(`Cannot read ${file}`, { cause: err });
          }

          const ruleSet = parseRules(text, { source: file });
          io.stdout(formatRules(ruleSet));

          if (!globals().quiet) {
            io.stderr(
              `${ruleSet.rules.length} rules; index columns: ${indexColumns(ruleSet).join(" ")}\n`
            );
          }
        },
        io.stderr
      );
    });

  // select
  addHeaderOptions(
    program
      .command("select")
      .description("Select the best calibration for a reference header")
      .argument("<type>", "Calibration type", parseTypeName)
  )
    .option("--policy <policy>", "Tie-break policy: before, nearest or latest", parsePolicy)
    .option("--json", "Print the selection as JSON")
    .action(async (type: string, options: SelectCommandOptions) => {
      await withTiming(
        "cli.select",
        async () => {
          const reference = await readHeader(options, io);
          const selection = await openStore().select(type, reference, { policy: options.policy });

          if (globals().verbose) {
            io.stderr(formatLines(rejectionLines(selection)));
          }

          if (options.json) {
            io.stdout(formatJson(selectionToJson(selection)));
          } else if (selection.status === "selected") {
            io.stdout(selection.record.name + "\n");
          } else {
            io.stderr(`No suitable ${type} calibration (${selection.reason})\n`);
          }

          if (selection.status === "none") {
            state.exitCode = 2;
          }
        },
        io.stderr
      );
    });

  // verify
  addHeaderOptions(
    program
      .command("verify")
      .description("Check a named calibration against a reference header")
      .argument("<type>", "Calibration type", parseTypeName)
      .argument("<name>", "Calibration name")
  ).action(async (type: string, name: string, options: HeaderInputOptions) => {
    await withTiming(
      "cli.verify",
      async () => {
        const reference = await readHeader(options, io);
        const verification = await openStore().verify(type, name, reference);
        io.stdout(describeVerification(type, name, verification) + "\n");
        if (!verification.suitable) {
          state.exitCode = 2;
        }
      },
      io.stderr
    );
  });

  // add
  addHeaderOptions(
    program
      .command("add")
      .description("Index a processed calibration frame")
      .argument("<type>", "Calibration type", parseTypeName)
      .argument("<name>", "Calibration name")
  ).action(async (type: string, name: string, options: HeaderInputOptions) => {
    await withTiming(
      "cli.add",
      async () => {
        const header = await readHeader(options, io);
        const record = await openStore().add(type, name, header);
        if (!globals().quiet) {
          io.stdout(`Added ${record.name} to ${type} index\n`);
        }
      },
      io.stderr
    );
  });

  // list
  program
    .command("list")
    .description("Print the records of an index")
    .argument("<type>", "Calibration type", parseTypeName)
    .option("--json", "Print records as JSON")
    .action(async (type: string, options: ListCommandOptions) => {
      await withTiming(
        "cli.list",
        async () => {
          const index = await openStore().index(type);
          if (options.json) {
            io.stdout(formatJson(index.records().map(recordToJson)));
          } else if (index.size > 0) {
            io.stdout(encodeIndexText(index.records(), index.columns()));
          }
        },
        io.stderr
      );
    });

  // value
  addHeaderOptions(
    program
      .command("value")
      .description("Print a column of the nearest matching calibration")
      .argument("<type>", "Calibration type", parseTypeName)
      .argument("<column>", "Header column")
  ).action(async (type: string, column: string, options: HeaderInputOptions) => {
    await withTiming(
      "cli.value",
      async () => {
        const reference = await readHeader(options, io);
        const value = await openStore().retrieveByColumn(type, column, reference);
        if (value === undefined) {
          io.stderr(`Column ${column} is not set on the selected ${type} calibration\n`);
          state.exitCode = 2;
          return;
        }
        io.stdout(toText(value) + "\n");
      },
      io.stderr
    );
  });

  return program;
}

/**
 * Run the CLI
 * @param argv - Arguments after the executable and script
 * @param io - Streams (defaults to the process streams)
 * @returns Exit code
 */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = createProgram(io, state);
  const level = logger.level;

  try {
    await program.parseAsync([...argv], { from: "user" });
    return state.exitCode;
  } catch (err) {
    // Commander has already written usage errors, help and version
    if (err instanceof CliError && err.reported) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose ?? false;
    io.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setLevel(level);
  }
}
