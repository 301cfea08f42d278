#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import {
  resolveDownloadArgs,
  resolveInferenceArgs,
  resolveKillArgs,
  resolveTrainingArgs,
} from "./args.js";
import { DEFAULT_CONFIG_FILE, loadLabConfig, selectProfile } from "./config.js";
import { readEnvSnapshot } from "./env.js";
import { LabError, UsageError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { LabService, type LabServiceParams } from "./service.js";
import type { EnvSnapshot } from "./types.js";

const COMMANDS = ["train", "infer", "kill-train", "kill-infer", "download"] as const;

type Command = (typeof COMMANDS)[number];

export const USAGE = `
slurm-lab: stage files to a SLURM cluster, submit jobs, cancel them, fetch outputs

Usage:
  slurm-lab [--config=FILE] [--profile=ID] <command> [args...]

Commands:
  train       [train_dataset] [val_dataset] [config_file] [output_name] [cluster_host]
              [wandb_project] [wandb_entity] [run_name] [resume_from]
  infer       [input_file] [config_file] [output_name] [adapter_path|cluster_host] [cluster_host]
  kill-train  [job_id] [cluster_host]
  kill-infer  [job_id] [cluster_host]
  download    [job_id] [output_name] [cluster_host]

Pass "" for any argument to keep its default while setting a later one.
wandb project/entity, run name and resume checkpoint fall back to WANDB_PROJECT,
WANDB_ENTITY, RUN_NAME and RESUME_FROM_CHECKPOINT. Training needs WANDB_API_KEY.
`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export type ParsedInvocation =
  | { kind: "help" }
  | { kind: "run"; command: Command; configFile: string; profile?: string; args: string[] };

export function parseInvocation(argv: readonly string[]): ParsedInvocation {
  let configFile = DEFAULT_CONFIG_FILE;
  let profile: string | undefined;
  let index = 0;

  for (; index < argv.length; index += 1) {
    const token = argv[index] ?? "";
    if (token === "-h" || token === "--help") {
      return { kind: "help" };
    }
    if (token.startsWith("--config=")) {
      configFile = token.slice("--config=".length);
      continue;
    }
    if (token.startsWith("--profile=")) {
      profile = token.slice("--profile=".length);
      continue;
    }
    break;
  }

  const command = argv[index];
  if (command === undefined) {
    return { kind: "help" };
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command "${command}". Expected one of: ${COMMANDS.join(", ")}`);
  }
  return { kind: "run", command, configFile, profile, args: argv.slice(index + 1) };
}

export type CliDeps = {
  env?: EnvSnapshot;
  logger?: Logger;
  write?: (text: string) => void;
  service?: Omit<LabServiceParams, "profile" | "env" | "logger">;
};

async function execute(
  invocation: Extract<ParsedInvocation, { kind: "run" }>,
  env: EnvSnapshot,
  logger: Logger,
  deps: CliDeps,
): Promise<unknown> {
  const config = await loadLabConfig(invocation.configFile);
  const profile = selectProfile(config, invocation.profile);
  const service = new LabService({ ...deps.service, profile, env, logger });
  const args = invocation.args;

  switch (invocation.command) {
    case "train":
      return await service.submitTraining(resolveTrainingArgs(args, env, profile));
    case "infer":
      return await service.submitInference(resolveInferenceArgs(args, profile));
    case "kill-train":
      return await service.kill(resolveKillArgs(args, "training", profile));
    case "kill-infer":
      return await service.kill(resolveKillArgs(args, "inference", profile));
    case "download":
      return await service.download(resolveDownloadArgs(args, profile));
    default:
      invocation.command satisfies never;
      throw new Error(`Unsupported command: ${String(invocation.command)}`);
  }
}

/** Runs one invocation and returns the process exit status. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? readEnvSnapshot();
  const logger = deps.logger ?? createLogger("slurm-lab", { level: env.logLevel });
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  try {
    const invocation = parseInvocation(argv);
    if (invocation.kind === "help") {
      write(USAGE);
      return 0;
    }
    const result = await execute(invocation, env, logger, deps);
    write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof LabError) {
      logger.error(error.message, { code: error.code, error: error.name });
    } else {
      logger.error(error instanceof Error ? error.message : String(error), {
        error: error instanceof Error ? error.name : "unknown",
      });
    }
    return 1;
  }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(realpathSync(invokedPath)).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
