import yargs from "yargs";
import { createConsoleLogger } from "@num-core";
import { loadConfig } from "./config/configManager";
import type { AppConfig } from "./config/schema";
import { runConfig, runGeomspace, runInterp, runLinspace, runSqrtm1 } from "./commands";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function buildCli(argv: string[], config: AppConfig, io: CliIO = consoleIO) {
  const print = (lines: string[]) => lines.forEach((line) => io.out(line));
  const logger = createConsoleLogger(config.logging.level, console, "numtools");

  return yargs(argv)
    .scriptName("numtools")
    .command(
      "linspace <start> <stop>",
      "evenly spaced values from start to stop",
      (y) =>
        y
          .positional("start", { type: "number", demandOption: true })
          .positional("stop", { type: "number", demandOption: true })
          .option("num", { type: "number", desc: "number of samples" })
          .option("endpoint", { type: "boolean", desc: "include stop" }),
      (args) => print(runLinspace(config, args))
    )
    .command(
      "geomspace <start> <stop>",
      "geometrically spaced values from start to stop",
      (y) =>
        y
          .positional("start", { type: "number", demandOption: true })
          .positional("stop", { type: "number", demandOption: true })
          .option("num", { type: "number", desc: "number of samples" })
          .option("endpoint", { type: "boolean", desc: "include stop" }),
      (args) => print(runGeomspace(config, args))
    )
    .command(
      "sqrtm1 <x>",
      "sqrt(a^2 + x) - a without cancellation",
      (y) =>
        y
          .positional("x", { type: "number", demandOption: true })
          .option("a", { type: "number", desc: "offset (default: the one-argument form)" }),
      (args) => print(runSqrtm1(config, args))
    )
    .command(
      "interp",
      "evaluate a log interpolant",
      (y) =>
        y
          .option("x", { type: "string", demandOption: true, desc: "comma-separated abscissae" })
          .option("y", { type: "string", demandOption: true, desc: "comma-separated ordinates" })
          .option("at", { type: "string", demandOption: true, desc: "comma-separated queries" })
          .option("method", { type: "string", choices: ["loglog", "xlog", "ylog"] })
          .option("extrapolation", { type: "string", desc: "throw | flat | linear | <level>" }),
      (args) => print(runInterp(config, args, logger))
    )
    .command("config", "print the effective configuration", {}, () => print(runConfig(config)))
    .demandCommand(1)
    .strict()
    .exitProcess(false)
    .fail(false)
    .help();
}

/** Runs the CLI and returns the exit code; errors are reported through `io.err`. */
export async function main(argv: string[], io: CliIO = consoleIO): Promise<number> {
  try {
    const config = loadConfig();
    await buildCli(argv, config, io).parseAsync();
    return 0;
  } catch (err) {
    io.err(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return 1;
  }
}
