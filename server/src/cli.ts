#!/usr/bin/env node
/**
 * upload-tracker: bulk upload bookkeeping for ingest loads.
 *
 * Manifests and jobs:
 *   upload-tracker create-manifest <load-id> <entries.json|listing.tsv>
 *   upload-tracker list-manifests [--prefix <p>]
 *   upload-tracker create-job <load-id>
 *   upload-tracker list-jobs [--load-id <id>] [--prefix <p>] [--status <S>]
 *   upload-tracker run-job <load-id> [--count <n>] [--mock]
 *   upload-tracker job-entries <load-id>
 *   upload-tracker cancel-job <load-id>
 *   upload-tracker complete-job <load-id> (--success|--failed) [--detail <text>] [--job-id <id>]
 *   upload-tracker report-job <load-id> [--json] [--out <file>]
 *   upload-tracker expire-jobs [--older-than-sec <n>]
 *
 * Listings:
 *   upload-tracker collect-remote-listing <output> [--prefix <p>]
 *   upload-tracker collect-local-listing <root> <output> [--checksum md5] [--symlinks follow|skip]
 *   upload-tracker compare-listings <a> <b> [--expected a|b] [--out <file>]
 *
 * Settings come from the environment (.env is read), see config.ts.
 */

import fs from "fs";
import dotenv from "dotenv";
import Joi from "joi";
import { loadConfig, type TrackerConfig } from "./config";
import { createServices, type Services } from "./container";
import { EXIT_CODE, TrackerError, ValidationError, errorMessage } from "./utils/errors";
import {
  LocalListingCollector,
  RemoteListingCollector,
  readListing,
  writeListing,
} from "./services/listing.service";
import { compare, type ListingSide } from "./services/reconcile.service";
import {
  renderEntryLine,
  renderJobLine,
  renderJobReport,
  renderManifestLine,
  renderReconciliation,
  writeReport,
} from "./services/report.service";
import { isJobStatus } from "./models/job.model";
import type { FileEntryInput } from "./services/manifest.service";
import type { CollectedListing } from "./models/listing.model";
import logger from "./utils/logger";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface CliContext {
  args: string[];
  config: TrackerConfig;
  io: CliIO;
  signal: AbortSignal;
}

type Command = (ctx: CliContext) => Promise<void>;

class UsageError extends Error {}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function required(value: string | undefined, usage: string): string {
  if (!value || value.startsWith("--")) throw new UsageError(`Usage: upload-tracker ${usage}`);
  return value;
}

async function withServices<T>(
  config: TrackerConfig,
  fn: (services: Services) => Promise<T>,
  options: { connectBroker?: boolean } = {},
): Promise<T> {
  const services = await createServices(config, options);
  try {
    return await fn(services);
  } finally {
    await services.close();
  }
}

const entriesFileSchema = Joi.array<FileEntryInput[]>()
  .items(Joi.object().unknown(true))
  .required();

async function readEntries(file: string): Promise<FileEntryInput[]> {
  if (!file.endsWith(".json")) {
    const listing = await readListing(file);
    return [...listing].map(([path, entry]) => ({ path, ...entry }));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(file, "utf8"));
  } catch (error) {
    throw new ValidationError(`cannot read ${file}: ${errorMessage(error)}`, {
      operation: "create-manifest",
    });
  }
  const { error, value } = entriesFileSchema.validate(raw);
  if (error) {
    throw new ValidationError(`${file} must hold an array of entries (${error.message})`, {
      operation: "create-manifest",
    });
  }
  return value;
}

// ── Manifests and jobs ─────────────────────────────────────

async function createManifest({ args, config, io }: CliContext): Promise<void> {
  const usage = "create-manifest <load-id> <entries.json|listing.tsv>";
  const loadId = required(args[0], usage);
  const file = required(args[1], usage);

  const entries = await readEntries(file);
  await withServices(config, async ({ manifests }) => {
    const manifest = await manifests.create(loadId, entries);
    io.out(renderManifestLine(manifest));
  });
}

async function listManifests({ args, config, io }: CliContext): Promise<void> {
  await withServices(config, async ({ manifests }) => {
    for await (const manifest of manifests.list({ prefix: getFlag(args, "--prefix") })) {
      io.out(renderManifestLine(manifest));
    }
  });
}

async function createJob({ args, config, io }: CliContext): Promise<void> {
  const loadId = required(args[0], "create-job <load-id>");
  await withServices(config, async ({ jobs }) => {
    io.out(renderJobLine(await jobs.create(loadId)));
  });
}

async function listJobs({ args, config, io }: CliContext): Promise<void> {
  const status = getFlag(args, "--status");
  if (status !== undefined && !isJobStatus(status)) {
    throw new UsageError(`Unknown status ${status}`);
  }

  await withServices(config, async ({ jobs }) => {
    const filter = {
      loadId: getFlag(args, "--load-id"),
      prefix: getFlag(args, "--prefix"),
      status,
    };
    for await (const job of jobs.list(filter)) {
      io.out(renderJobLine(job));
    }
  });
}

async function runJob({ args, config, io }: CliContext): Promise<void> {
  const usage = "run-job <load-id> [--count <n>] [--mock]";
  const loadId = required(args[0], usage);
  const rawCount = getFlag(args, "--count");
  const count = rawCount === undefined ? undefined : Number(required(rawCount, usage));
  if (count !== undefined && (!Number.isInteger(count) || count < 1)) {
    throw new UsageError(`--count needs a positive integer, got ${rawCount}`);
  }

  await withServices(
    config,
    async ({ jobs }) => {
      io.out(renderJobLine(await jobs.run(loadId, { count, mock: hasFlag(args, "--mock") })));
    },
    { connectBroker: true },
  );
}

async function jobEntries({ args, config, io }: CliContext): Promise<void> {
  const loadId = required(args[0], "job-entries <load-id>");
  await withServices(config, async ({ jobs }) => {
    for (const entry of await jobs.entries(loadId)) {
      io.out(renderEntryLine(entry));
    }
  });
}

async function cancelJob({ args, config, io }: CliContext): Promise<void> {
  const loadId = required(args[0], "cancel-job <load-id>");
  await withServices(config, async ({ broker, jobs }) => {
    // only a RUNNING job needs the agent told; a missing broker is logged by cancel()
    if ((await jobs.get(loadId, "cancel-job")).status === "RUNNING") {
      await broker.connect().catch((error: unknown) => {
        logger.warn(`Broker unavailable, the transfer agent will not be interrupted`, {
          error: errorMessage(error),
        });
      });
    }
    io.out(renderJobLine(await jobs.cancel(loadId)));
  });
}

async function completeJob({ args, config, io }: CliContext): Promise<void> {
  const usage = "complete-job <load-id> (--success|--failed) [--detail <text>] [--job-id <id>]";
  const loadId = required(args[0], usage);
  const success = hasFlag(args, "--success");
  if (success === hasFlag(args, "--failed")) throw new UsageError(`Usage: upload-tracker ${usage}`);

  await withServices(config, async ({ jobs }) => {
    const job = await jobs.complete(
      loadId,
      { success, detail: getFlag(args, "--detail") },
      getFlag(args, "--job-id"),
    );
    io.out(renderJobLine(job));
  });
}

async function reportJob({ args, config, io }: CliContext): Promise<void> {
  const loadId = required(args[0], "report-job <load-id> [--json] [--out <file>]");
  await withServices(config, async ({ jobs }) => {
    const report = await jobs.report(loadId);
    const text = hasFlag(args, "--json")
      ? `${JSON.stringify(report, null, 2)}\n`
      : renderJobReport(report);
    await emit(io, text, getFlag(args, "--out"));
  });
}

async function expireJobs({ args, config, io }: CliContext): Promise<void> {
  const raw = getFlag(args, "--older-than-sec") ?? String(config.jobStaleAfterSec);
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new UsageError("expire-jobs needs --older-than-sec <n> or JOB_STALE_AFTER_SEC > 0");
  }

  await withServices(config, async ({ jobs }) => {
    for (const job of await jobs.expireStale(seconds * 1000)) {
      io.out(renderJobLine(job));
    }
  });
}

// ── Listings ───────────────────────────────────────────────

function describeCollection(io: CliIO, output: string, { stats }: CollectedListing): void {
  io.out(`${stats.files} files, ${stats.totalBytes} bytes written to ${output}`);
  for (const skipped of stats.skipped) {
    io.err(`skipped: ${skipped}`);
  }
}

async function collectRemoteListing({ args, config, io, signal }: CliContext): Promise<void> {
  const output = required(args[0], "collect-remote-listing <output> [--prefix <p>]");
  const prefix = getFlag(args, "--prefix") ?? config.storage.prefix;

  await withServices(config, async ({ storage }) => {
    const collected = await new RemoteListingCollector(storage, prefix).collect({
      signal,
      timeoutMs: config.listingTimeoutSec * 1000,
    });
    await writeListing(output, collected.listing);
    describeCollection(io, output, collected);
  });
}

async function collectLocalListing({ args, config, io, signal }: CliContext): Promise<void> {
  const usage =
    "collect-local-listing <root> <output> [--checksum md5] [--symlinks follow|skip]";
  const root = required(args[0], usage);
  const output = required(args[1], usage);

  const checksum = getFlag(args, "--checksum") ?? "none";
  const symlinks = getFlag(args, "--symlinks") ?? config.localSymlinks;
  if (checksum !== "md5" && checksum !== "none") throw new UsageError(`Unknown checksum ${checksum}`);
  if (symlinks !== "follow" && symlinks !== "skip") throw new UsageError(`Unknown symlink policy ${symlinks}`);

  const collected = await new LocalListingCollector(root, { checksum, symlinks }).collect({
    signal,
    timeoutMs: config.listingTimeoutSec * 1000,
  });
  await writeListing(output, collected.listing);
  describeCollection(io, output, collected);
}

async function compareListings({ args, io }: CliContext): Promise<void> {
  const usage = "compare-listings <a> <b> [--expected a|b] [--out <file>]";
  const fileA = required(args[0], usage);
  const fileB = required(args[1], usage);
  const expected = getFlag(args, "--expected") ?? "b";
  if (expected !== "a" && expected !== "b") throw new UsageError(`Usage: upload-tracker ${usage}`);
  const side: ListingSide = expected;

  const report = compare(await readListing(fileA), await readListing(fileB), { expected: side });
  await emit(io, renderReconciliation(report), getFlag(args, "--out"));
}

async function emit(io: CliIO, text: string, out: string | undefined): Promise<void> {
  if (out) {
    await writeReport(out, text);
    return;
  }
  io.out(text.replace(/\n$/, ""));
}

// ── Main ───────────────────────────────────────────────────

const commands: Record<string, Command> = {
  "create-manifest": createManifest,
  "list-manifests": listManifests,
  "create-job": createJob,
  "list-jobs": listJobs,
  "run-job": runJob,
  "job-entries": jobEntries,
  "cancel-job": cancelJob,
  "complete-job": completeJob,
  "report-job": reportJob,
  "expire-jobs": expireJobs,
  "collect-remote-listing": collectRemoteListing,
  "collect-local-listing": collectLocalListing,
  "compare-listings": compareListings,
};

const HELP = `upload-tracker <command> [args]

Commands:
  ${Object.keys(commands).join("\n  ")}

Exit codes: 0 ok, 1 unexpected, 2 validation, 3 not found,
4 illegal transition, 5 conflict, 6 transfer fault, 7 partial listing`;

export async function main(
  argv: string[],
  io: CliIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env,
  signal: AbortSignal = new AbortController().signal,
): Promise<number> {
  const [command, ...args] = argv;
  const handler = command ? commands[command] : undefined;
  if (!handler) {
    io.out(HELP);
    return command ? 1 : 0;
  }

  try {
    await handler({ args, config: loadConfig(env), io, signal });
    return 0;
  } catch (error) {
    if (error instanceof TrackerError) {
      io.err(`Error [${error.kind}]: ${error.message}`);
      return EXIT_CODE[error.kind];
    }
    if (error instanceof UsageError) {
      io.err(error.message);
      return EXIT_CODE.validation;
    }
    logger.error(`Unexpected failure in ${command}:`, error);
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  main(process.argv.slice(2), consoleIO, process.env, controller.signal)
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
