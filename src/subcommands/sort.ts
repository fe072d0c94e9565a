import { Command, type OptionValues } from "@commander-js/extra-typings";
import { sortVersions } from "../compareVersions.js";
import { addLogLevelOptions, createLogger, type LogLevelArgs } from "../logLevel.js";
import { collectVersions } from "./shared.js";

type SortCommandOptions = OptionValues &
  LogLevelArgs & {
    file?: string;
    reverse?: boolean;
    json?: boolean;
  };

const sortCommand = new Command<[], SortCommandOptions>()
  .name("sort")
  .description("Sorts versions from lowest to highest precedence")
  .argument("[versions...]", "The versions to sort")
  .option("--file <path>", "Reads additional versions from a JSON file")
  .option("--reverse", "Sorts from highest to lowest precedence")
  .option("--json", "Outputs the sorted versions as a JSON array to stdout");

addLogLevelOptions(sortCommand);

sortCommand.action(async (positional, options) => {
  const logger = createLogger(options);
  const { file, reverse = false, json = false } = options;
  const versions = await collectVersions(positional, file, logger);
  const sorted = sortVersions(versions, reverse ? "descending" : "ascending");
  if (json) {
    console.info(JSON.stringify(sorted));
    return;
  }
  for (const version of sorted) {
    console.info(version);
  }
});

export const sort = sortCommand;
