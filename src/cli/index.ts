#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runSync } from "../commands/sync";
import { runValidate } from "../commands/validate";
import { SyncError, errorMessage } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.OBJECTS_SYNC_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

interface GlobalCliOptions {
  envFile?: string;
  config?: string;
}

interface SyncCliOptions {
  schemas?: string;
  staging?: string;
  concurrency?: number;
  runId?: string;
  dryRun: boolean;
  force: boolean;
  strict: boolean;
}

interface ValidateCliOptions {
  schemas?: string;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("objects-sync")
  .description("Publish platform object schemas and their diagrams to documentation pages")
  .version(pkg.version);

program
  .option(
    "--env-file <path>",
    "Path to .env file (overrides OBJECTS_SYNC_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .option("--config <path>", "JSON config file (overrides OBJECTS_SYNC_CONFIG)");

program
  .command("sync")
  .description("Export diagrams and upsert one documentation page per schema file")
  .option("--schemas <dir>", "Schema directory")
  .option("--staging <dir>", "Staging directory for diagrams, backups and run manifests")
  .option("--concurrency <n>", "Objects processed in parallel", parsePositiveInt)
  .option("--run-id <id>", "Run ID (defaults to the current UTC time)")
  .option("--dry-run", "Render pages into the staging directory without publishing", false)
  .option("--force", "Publish pages even when their content is unchanged", false)
  .option("--strict", "Exit non-zero when any schema file fails to load", false)
  .action(async (opts: SyncCliOptions) => {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      console.warn("\nInterrupted: finishing objects in flight, no new objects will start.");
      controller.abort();
      process.off("SIGINT", onInterrupt);
    };
    process.on("SIGINT", onInterrupt);

    try {
      const result = await runSync(
        {
          configPath: program.opts<GlobalCliOptions>().config,
          schemaDir: opts.schemas,
          stagingDir: opts.staging,
          concurrency: opts.concurrency,
          runId: opts.runId,
          dryRun: opts.dryRun,
          force: opts.force,
          strict: opts.strict
        },
        { signal: controller.signal }
      );
      process.exitCode = result.exitCode;
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  });

program
  .command("validate")
  .description("Check every schema file without contacting the design tool or documentation platform")
  .option("--schemas <dir>", "Schema directory")
  .action(async (opts: ValidateCliOptions) => {
    const result = await runValidate({
      configPath: program.opts<GlobalCliOptions>().config,
      schemaDir: opts.schemas
    });
    process.exitCode = result.exitCode;
  });

program.parseAsync().catch((error: unknown) => {
  const label = error instanceof SyncError ? `${error.kind}: ` : "";
  console.error(`${label}${errorMessage(error)}`);
  process.exitCode = 1;
});
