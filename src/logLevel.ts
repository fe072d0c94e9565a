import { Option, type Command, type OptionValues } from "@commander-js/extra-typings";
import chalk from "chalk";
import { Console } from "node:console";
import { UserInputError } from "./types/errors.js";

const levels = ["debug", "info", "warn", "error", "none"] as const;

/**
 * Adds log level options to a commander.js command
 *
 * The options are hidden from the help output. Add them after the command's own options so the
 * help stays readable.
 */
export function addLogLevelOptions<
  Args extends unknown[],
  Opts extends OptionValues,
  GlobalOpts extends OptionValues,
>(command: Command<Args, Opts, GlobalOpts>): Command<Args, Opts & LogLevelArgs, GlobalOpts> {
  return command
    .addOption(
      new Option("--log-level <level>", "The level of logging to use").choices(levels).hideHelp(),
    )
    .addOption(new Option("--quiet", "Suppress all logging").hideHelp())
    .addOption(new Option("--verbose", "Enable verbose logging").hideHelp()) as Command<
    Args,
    Opts & LogLevelArgs,
    GlobalOpts
  >;
}

export interface LogLevelArgs {
  logLevel?: "debug" | "info" | "warn" | "error" | "none";
  verbose?: boolean;
  quiet?: boolean;
}

export interface LogLevelMap {
  debug: boolean;
  info: boolean;
  warn: boolean;
  error: boolean;
}

export interface Logger {
  debug(...messages: unknown[]): void;
  info(...messages: unknown[]): void;
  warn(...messages: unknown[]): void;
  error(...messages: unknown[]): void;
}

export function getLogLevelMap({
  logLevel,
  verbose = false,
  quiet = false,
}: LogLevelArgs): LogLevelMap {
  let numSpecified = 0;
  if (logLevel !== undefined) {
    numSpecified++;
  }
  if (verbose) {
    numSpecified++;
  }
  if (quiet) {
    numSpecified++;
  }
  if (numSpecified > 1) {
    throw new UserInputError(
      `Only one of ${chalk.yellow("--log-level")}, ${chalk.yellow("--verbose")}, or ` +
        `${chalk.yellow("--quiet")} can be specified.`,
    );
  }
  if (quiet) {
    logLevel = "none";
  }
  if (verbose) {
    logLevel = "debug";
  }
  const level = levels.indexOf(logLevel ?? "info");
  return {
    debug: level <= levels.indexOf("debug"),
    info: level <= levels.indexOf("info"),
    warn: level <= levels.indexOf("warn"),
    error: level <= levels.indexOf("error"),
  };
}

/**
 * Creates a logger that writes to stderr, so that stdout only carries command results.
 */
export function createLogger({ logLevel, verbose, quiet }: LogLevelArgs): Logger {
  const console = new Console({
    stdout: process.stderr,
    stderr: process.stderr,
  });
  const levelMap = getLogLevelMap({ logLevel, verbose, quiet });
  // The info prefix only shows up in verbose mode, where it sets info apart from debug lines
  const showInfoPrefix = verbose === true || logLevel === "debug";
  return {
    debug: levelMap.debug
      ? (...messages) => console.debug(chalk.gray("D"), ...messages)
      : () => {},
    info: levelMap.info
      ? (...messages) =>
          showInfoPrefix ? console.info(chalk.cyan("I"), ...messages) : console.info(...messages)
      : () => {},
    warn: levelMap.warn
      ? (...messages) => console.warn(chalk.yellow("Warning:"), ...messages)
      : () => {},
    error: levelMap.error
      ? (...messages) => console.error(chalk.red("Error:"), ...messages)
      : () => {},
  };
}
