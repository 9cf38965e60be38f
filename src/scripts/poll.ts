// Standalone poller: full sync without the HTTP server
import { parseArgs } from "util";
import { loadConfig } from "../config/index.js";
import { createLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";
import { createRuntime } from "../runtime.js";
import type { SyncService } from "../sync/service.js";
import { isBusy } from "../sync/service.js";

const USAGE = `
Usage: node dist/scripts/poll.js [--once] [--cycles <n>] [--interval <seconds>] [--config <path>] [--verbose]

  --once      Run a single full sync and exit
  --cycles    Search pages per full sync (default: sync.maxCycles)
  --interval  Seconds between passes when looping (default: scheduler.fullSyncIntervalMs)
  --config    YAML config file (default: CONFIG_PATH or config/app.yml)
  --verbose   Log at debug level
`;

export interface PollArgs {
  once: boolean;
  cycles?: number;
  intervalMs?: number;
  configPath?: string;
  verbose: boolean;
}

function positiveInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parsePollArgs(argv: string[]): PollArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      once: { type: "boolean", default: false },
      cycles: { type: "string" },
      interval: { type: "string" },
      config: { type: "string" },
      verbose: { type: "boolean", default: false },
    },
    strict: true,
  });

  const intervalSeconds = positiveInteger("--interval", values.interval);
  return {
    once: values.once ?? false,
    cycles: positiveInteger("--cycles", values.cycles),
    intervalMs: intervalSeconds === undefined ? undefined : intervalSeconds * 1000,
    configPath: values.config,
    verbose: values.verbose ?? false,
  };
}

export interface PollLoopOptions {
  cycles: number;
  intervalMs: number;
  once: boolean;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}

/**
 * Run full syncs until aborted (or once). A failed pass is logged and the
 * loop carries on with the next one. Returns the number of passes run.
 */
export async function runPollLoop(service: Pick<SyncService, "fullSync">, options: PollLoopOptions): Promise<number> {
  const sleep = options.sleep ?? abortableSleep;
  let passes = 0;

  while (!options.signal?.aborted) {
    passes++;
    try {
      const result = await service.fullSync(options.cycles);
      if (isBusy(result)) {
        options.logger.info({ runningOperation: result.runningOperation }, "Poll skipped, busy");
      } else {
        options.logger.info(
          {
            checked: result.checked,
            processed: result.processed,
            skipped: result.skipped,
            failed: result.failed,
            retryable: result.retryable ?? false,
          },
          "Poll pass complete"
        );
      }
    } catch (error) {
      if (options.once) throw error;
      options.logger.error({ err: error }, "Poll pass failed");
    }

    if (options.once) break;
    await sleep(options.intervalMs, options.signal);
  }

  return passes;
}

async function main() {
  let args: PollArgs;
  try {
    args = parsePollArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(2);
    return;
  }

  if (args.configPath) {
    process.env.CONFIG_PATH = args.configPath;
  }
  const config = loadConfig();
  const logger = createLogger(args.verbose ? "debug" : config.log.level);
  const { service, database } = await createRuntime(config, logger);

  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());
  process.on("SIGTERM", () => controller.abort());

  try {
    await runPollLoop(service, {
      cycles: args.cycles ?? config.sync.maxCycles,
      intervalMs: args.intervalMs ?? config.scheduler.fullSyncIntervalMs,
      once: args.once,
      logger,
      signal: controller.signal,
    });
  } finally {
    database.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error("Poller failed:", error);
    process.exit(1);
  });
}
