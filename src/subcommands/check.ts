import { Command, type OptionValues } from "@commander-js/extra-typings";
import chalk from "chalk";
import { sortVersions } from "../compareVersions.js";
import { addLogLevelOptions, createLogger, type LogLevelArgs } from "../logLevel.js";
import { Version } from "../Version.js";

type CheckCommandOptions = OptionValues &
  LogLevelArgs & {
    json?: boolean;
  };

/**
 * Pairs where the left version must have lower precedence than the right one.
 */
const ascendingPairs: ReadonlyArray<readonly [string, string]> = [
  ["1.0.0", "2.0.0"],
  ["1.0.0", "1.42.0"],
  ["1.2.0", "1.2.42"],
  ["1.1.0-alpha", "1.2.0-alpha.1"],
  ["1.0.1b", "1.0.10-alpha.beta"],
  ["1.0.0-rc.1", "1.0.0"],
];

/**
 * The precedence chain from the SemVer 2.0.0 document, already in ascending order.
 */
const precedenceChain: ReadonlyArray<string> = [
  "1.0.0-alpha",
  "1.0.0-alpha.1",
  "1.0.0-alpha.beta",
  "1.0.0-beta",
  "1.0.0-beta.2",
  "1.0.0-beta.11",
  "1.0.0-rc.1",
  "1.0.0",
];

export interface CheckResult {
  name: string;
  passed: boolean;
}

function checkPair(rawLeft: string, rawRight: string): CheckResult {
  const left = new Version(rawLeft);
  const right = new Version(rawRight);
  return {
    name: `${rawLeft} < ${rawRight}`,
    passed: left.lt(right) && right.gt(left) && right.ne(left),
  };
}

function checkChain(chain: ReadonlyArray<string>): CheckResult {
  const shuffled = [...chain].reverse();
  const sorted = sortVersions(shuffled);
  return {
    name: `sort ${chain.join(" < ")}`,
    passed: sorted.every((version, index) => version === chain[index]),
  };
}

export function runChecks(): CheckResult[] {
  return [
    ...ascendingPairs.map(([left, right]) => checkPair(left, right)),
    checkChain(precedenceChain),
  ];
}

export function formatCheckResult({ name, passed }: CheckResult): string {
  return passed ? `${chalk.green("✓")} ${name}` : `${chalk.red("✗")} ${name}`;
}

const checkCommand = new Command<[], CheckCommandOptions>()
  .name("check")
  .description("Runs the built-in precedence checks")
  .option("--json", "Outputs the check results in JSON format to stdout");

addLogLevelOptions(checkCommand);

checkCommand.action(options => {
  const logger = createLogger(options);
  const { json = false } = options;
  const results = runChecks();
  if (json) {
    console.info(JSON.stringify(results));
  } else {
    for (const result of results) {
      console.info(formatCheckResult(result));
    }
  }
  const failed = results.filter(result => !result.passed);
  if (failed.length > 0) {
    logger.error(`${failed.length} of ${results.length} checks failed.`);
    process.exitCode = 1;
    return;
  }
  logger.debug(`All ${results.length} checks passed.`);
});

export const check = checkCommand;
