import { Command, type OptionValues } from "@commander-js/extra-typings";
import { type Ordering } from "../comparePrerelease.js";
import { addLogLevelOptions, createLogger, type LogLevelArgs } from "../logLevel.js";
import { Version } from "../Version.js";

type CompareCommandOptions = OptionValues &
  LogLevelArgs & {
    json?: boolean;
  };

function relationSymbol(ordering: Ordering): string {
  switch (ordering) {
    case -1:
      return "<";
    case 0:
      return "==";
    case 1:
      return ">";
  }
}

export function describeComparison(left: Version, right: Version): string {
  return `${left.raw} ${relationSymbol(left.compare(right))} ${right.raw}`;
}

const compareCommand = new Command<[], CompareCommandOptions>()
  .name("compare")
  .description("Compares the precedence of two versions")
  .argument("<left>", "The version on the left-hand side")
  .argument("<right>", "The version on the right-hand side")
  .option("--json", "Outputs the result in JSON format to stdout");

addLogLevelOptions(compareCommand);

compareCommand.action((rawLeft, rawRight, options) => {
  const logger = createLogger(options);
  const { json = false } = options;
  const left = new Version(rawLeft);
  const right = new Version(rawRight);
  if (left.build !== undefined || right.build !== undefined) {
    logger.debug("Build metadata is ignored when comparing versions");
  }
  if (json) {
    console.info(JSON.stringify({ left: left.raw, right: right.raw, result: left.compare(right) }));
    return;
  }
  console.info(describeComparison(left, right));
});

export const compare = compareCommand;
