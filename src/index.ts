#!/usr/bin/env node
import {
  program,
  type CommandUnknownOpts,
  type HelpConfiguration,
} from "@commander-js/extra-typings";
import chalk from "chalk";
import { check } from "./subcommands/check.js";
import { compare } from "./subcommands/compare.js";
import { latest } from "./subcommands/latest.js";
import { parse } from "./subcommands/parse.js";
import { sort } from "./subcommands/sort.js";
import { UserInputError, VersionError } from "./types/errors.js";

const HELP_MESSAGE_PADDING_LEFT = 1;
const HELP_MESSAGE_MAX_WIDTH = 90;
const HELP_MESSAGE_GAP = 10;
const SUBCOMMAND_HELP_MESSAGE_GAP = 3;

function addCommandsGroup(title: string, commands: Array<CommandUnknownOpts>): void {
  program.commandsGroup(chalk.bold(title));
  commands.forEach(command => {
    program.addCommand(command);
  });
}

function createHelpConfiguration(helpMessageGap: number): HelpConfiguration {
  return {
    helpWidth: HELP_MESSAGE_MAX_WIDTH,
    commandUsage: command => chalk.bold(`${command.name()} ${command.usage()}`),
    subcommandTerm: (command: { name(): string }) =>
      chalk.bold(
        `${" ".repeat(HELP_MESSAGE_PADDING_LEFT)}${command
          .name()
          .padEnd(command.name().length + helpMessageGap)}`,
      ),
    optionTerm: (option: { flags: string }) =>
      chalk.cyan(
        `${" ".repeat(HELP_MESSAGE_PADDING_LEFT)}${option.flags.padEnd(
          option.flags.length + helpMessageGap,
        )}`,
      ),
  };
}

program.name("semver-order");
program.description("Parses and orders semantic versions");
program.helpCommand(false);
program.configureHelp(createHelpConfiguration(HELP_MESSAGE_GAP));

addCommandsGroup("Inspect", [parse, compare]);
addCommandsGroup("Collections", [sort, latest]);
program.addCommand(check, { hidden: true });

for (const subcommand of program.commands) {
  subcommand.configureHelp(createHelpConfiguration(SUBCOMMAND_HELP_MESSAGE_GAP));
}

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof UserInputError || error instanceof VersionError) {
    // Omit stack trace for errors caused by the arguments
    console.error(chalk.red(error.message));
  } else if (error instanceof Error) {
    console.error(error.stack ?? error.message);
  } else {
    console.error(String(error));
  }
  process.exit(1);
});
