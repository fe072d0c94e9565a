import { Command, type OptionValues } from "@commander-js/extra-typings";
import chalk from "chalk";
import { addLogLevelOptions, createLogger, type LogLevelArgs } from "../logLevel.js";
import { Version } from "../Version.js";

type ParseCommandOptions = OptionValues &
  LogLevelArgs & {
    json?: boolean;
  };

export interface ParsedVersionJson {
  major: number;
  minor: number;
  patch: number;
  prerelease: string | null;
  build: string | null;
}

export function toParsedVersionJson(version: Version): ParsedVersionJson {
  return {
    major: version.major,
    minor: version.minor,
    patch: version.patch,
    prerelease: version.prerelease ?? null,
    build: version.build ?? null,
  };
}

export function formatParsedVersion(version: Version): string[] {
  const none = chalk.gray("(none)");
  return [
    `${chalk.blue("major:")}       ${version.major}`,
    `${chalk.blue("minor:")}       ${version.minor}`,
    `${chalk.blue("patch:")}       ${version.patch}`,
    `${chalk.blue("pre-release:")} ${version.prerelease ?? none}`,
    `${chalk.blue("build:")}       ${version.build ?? none}`,
  ];
}

const parseCommand = new Command<[], ParseCommandOptions>()
  .name("parse")
  .description("Splits a version into its components")
  .argument("<version>", "The version to parse, e.g. 1.0.0-alpha.1+build.5")
  .option("--json", "Outputs the components in JSON format to stdout");

addLogLevelOptions(parseCommand);

parseCommand.action((rawVersion, options) => {
  const logger = createLogger(options);
  const { json = false } = options;
  logger.debug(`Parsing ${rawVersion}`);
  const version = new Version(rawVersion);
  if (json) {
    console.info(JSON.stringify(toParsedVersionJson(version)));
    return;
  }
  for (const line of formatParsedVersion(version)) {
    console.info(line);
  }
});

export const parse = parseCommand;
