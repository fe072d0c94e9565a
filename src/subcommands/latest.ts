import { Command, type OptionValues } from "@commander-js/extra-typings";
import { findLatestVersion } from "../findLatestVersion.js";
import { addLogLevelOptions, createLogger, type LogLevelArgs } from "../logLevel.js";
import { collectVersions } from "./shared.js";

type LatestCommandOptions = OptionValues &
  LogLevelArgs & {
    file?: string;
    json?: boolean;
  };

const latestCommand = new Command<[], LatestCommandOptions>()
  .name("latest")
  .description("Prints the version with the highest precedence")
  .argument("[versions...]", "The versions to choose from")
  .option("--file <path>", "Reads additional versions from a JSON file")
  .option("--json", "Outputs the version as a JSON string to stdout");

addLogLevelOptions(latestCommand);

latestCommand.action(async (positional, options) => {
  const logger = createLogger(options);
  const { file, json = false } = options;
  const versions = await collectVersions(positional, file, logger);
  const latest = findLatestVersion(versions.map(version => ({ version })));
  if (latest === null) {
    // collectVersions never returns an empty list
    throw new Error("No latest version found");
  }
  console.info(json ? JSON.stringify(latest.version) : latest.version);
});

export const latest = latestCommand;
