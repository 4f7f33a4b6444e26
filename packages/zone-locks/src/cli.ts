/**
 * CLI pipeline: parse args -> load config -> report, control one zone, or
 * process every zone -> log run time. Always exits 0; outcomes are in the log.
 */

import { wrapError } from "@zone-locks/errors";

import { BOOLEAN_FLAGS, parseArgv, VALUE_FLAGS } from "./args.js";
import { DEFAULT_CONFIG_FILE } from "./config.js";
import { ZoneLockController } from "./controller.js";
import { createLogger, type Logger } from "./logger.js";
import {
  controlZoneLock,
  processAllZones,
  reportLockStatus,
  resolveIntent,
} from "./orchestration.js";
import { getReporter, isOutputFormat, type OutputFormat } from "./reporters/index.js";
import { VERSION } from "./version.js";

export interface CliArgs {
  readonly config: string;
  readonly zone: string | undefined;
  readonly zoneRef: string | undefined;
  readonly view: string | undefined;
  readonly lock: boolean;
  readonly unlock: boolean;
  readonly debug: boolean;
  readonly format: OutputFormat;
  readonly help: boolean;
  readonly version: boolean;
  /** Problems found while parsing, logged once a logger exists */
  readonly warnings: readonly string[];
  /** Options that cannot be acted on; the run stops before connecting */
  readonly usageErrors: readonly string[];
}

export interface CliDependencies {
  readonly logger?: Logger;
  readonly createController?: (configPath: string, logger: Logger) => Promise<ZoneLockController>;
  readonly stdout?: (text: string) => void;
  /** Milliseconds clock used for the run time */
  readonly clock?: () => number;
}

/** The process exit code; failures are only visible in the log */
export const EXIT_CODE = 0;

function stringFlag(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function optionName(key: string): string {
  return key.length === 1 ? `-${key}` : `--${key}`;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);
  const warnings: string[] = [];
  const usageErrors: string[] = [];

  for (const [key, value] of Object.entries(flags)) {
    if (VALUE_FLAGS.has(key)) {
      if (stringFlag(value) === undefined) {
        usageErrors.push(`Option ${optionName(key)} requires a value`);
      }
    } else if (!BOOLEAN_FLAGS.has(key)) {
      warnings.push(`Ignoring unknown option "${optionName(key)}"`);
    }
  }

  let format: OutputFormat = "log";
  const rawFormat = stringFlag(flags.format);
  if (rawFormat !== undefined && isOutputFormat(rawFormat)) {
    format = rawFormat;
  } else if (rawFormat !== undefined) {
    warnings.push(`Unknown output format "${rawFormat}", using "log"`);
  }

  for (const positional of positionals) {
    warnings.push(`Ignoring unexpected argument "${positional}"`);
  }

  return {
    config: stringFlag(flags.config) ?? DEFAULT_CONFIG_FILE,
    zone: stringFlag(flags.zone),
    zoneRef: stringFlag(flags.ref),
    view: stringFlag(flags.view),
    lock: flags.lock === true,
    unlock: flags.unlock === true,
    debug: flags.debug === true,
    format,
    help: flags.help === true,
    version: flags.version === true,
    warnings,
    usageErrors,
  };
}

export const HELP_TEXT = `
  zone-locks - Manage DNS zone locks through WAPI

  Usage:
    zone-locks [options]

  Options:
    -c, --config <file>    INI file with a [NIOS] section (default: ${DEFAULT_CONFIG_FILE})
    -z, --zone <fqdn>      Operate on a specific zone
    -r, --ref <_ref>       Operate on a specific zone by object reference
        --view <name>      Restrict zone lookups to a DNS view
    -l, --lock             Lock zone(s)
    -u, --unlock           Unlock zone(s); wins over --lock
    -d, --debug            Enable debug messages
    -f, --format <fmt>     Status output: log, text or json (default: log)
    -v, --version          Show the version
    -h, --help             Show this help message

  Without --lock or --unlock the lock status is reported.
  With --lock or --unlock and no --zone/--ref, every zone is processed.

  Examples:
    zone-locks --config gm.ini
    zone-locks --zone example.com --lock
    zone-locks --unlock --debug
`;

async function run(
  controller: ZoneLockController,
  logger: Logger,
  args: CliArgs,
  stdout: (text: string) => void,
): Promise<void> {
  const intent = resolveIntent(args.lock, args.unlock);

  if (intent === "none") {
    const zones = await reportLockStatus(controller, logger, {
      ...(args.zone ? { zone: args.zone } : {}),
      ...(args.view ? { view: args.view } : {}),
    });
    const reporter = getReporter(args.format);
    if (reporter) {
      stdout(reporter.report(zones));
    }
    return;
  }

  if (args.zone || args.zoneRef) {
    await controlZoneLock(controller, {
      lock: args.lock,
      unlock: args.unlock,
      ...(args.zone ? { zone: args.zone } : {}),
      ...(args.zoneRef ? { zoneRef: args.zoneRef } : {}),
      ...(args.view ? { view: args.view } : {}),
    });
    return;
  }

  await processAllZones(controller, logger, {
    lock: args.lock,
    unlock: args.unlock,
    ...(args.view ? { view: args.view } : {}),
  });
}

export async function main(
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> {
  const args = parseArgs(argv);
  const stdout = deps.stdout ?? ((text: string) => console.log(text));

  if (args.help) {
    stdout(HELP_TEXT);
    return EXIT_CODE;
  }

  if (args.version) {
    stdout(VERSION);
    return EXIT_CODE;
  }

  const logger = deps.logger ?? createLogger({ level: args.debug ? "debug" : "info" });
  const clock = deps.clock ?? (() => performance.now());
  const createController =
    deps.createController ??
    ((configPath: string, log: Logger) => ZoneLockController.fromConfigFile(configPath, log));

  for (const warning of args.warnings) {
    logger.warn(warning);
  }

  if (args.usageErrors.length > 0) {
    for (const usageError of args.usageErrors) {
      logger.error(usageError);
    }
    logger.error("Nothing was changed; see zone-locks --help");
    return EXIT_CODE;
  }

  const started = clock();
  try {
    const controller = await createController(args.config, logger);
    try {
      await run(controller, logger, args, stdout);
    } finally {
      await controller.close();
    }
  } catch (error) {
    const failure = wrapError(error);
    logger.error(`Unexpected failure: ${failure.message}`);
    const stack = failure.cause instanceof Error ? failure.cause.stack : failure.stack;
    if (!failure.isExpected && stack) {
      logger.debug(stack);
    }
  }

  const seconds = (clock() - started) / 1000;
  logger.info(`Run time: ${seconds.toFixed(3)}s`);

  return EXIT_CODE;
}
