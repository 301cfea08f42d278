import fs from "node:fs/promises";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { toPosixRemotePath } from "./paths.js";
import type { InferenceDefaults, LabConfig, LabProfile, TrainingDefaults } from "./types.js";

export const DEFAULT_CONFIG_FILE = "lab.config.json";

const TrainingSectionSchema = Type.Object(
  {
    script: Type.Optional(Type.String()),
    jobName: Type.Optional(Type.String()),
    trainDataset: Type.Optional(Type.String()),
    valDataset: Type.Optional(Type.String()),
    configFile: Type.Optional(Type.String()),
    outputName: Type.Optional(Type.String()),
    wandbProject: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const InferenceSectionSchema = Type.Object(
  {
    script: Type.Optional(Type.String()),
    jobName: Type.Optional(Type.String()),
    inputFile: Type.Optional(Type.String()),
    configFile: Type.Optional(Type.String()),
    outputName: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const ProfileSchema = Type.Object(
  {
    clusterHost: Type.String({ description: "ssh target, e.g. user@login-node" }),
    clusterUser: Type.Optional(Type.String({ description: "Queue owner used by squeue -u" })),
    remoteBaseDir: Type.String({ description: "Directory on the cluster receiving uploads" }),
    remoteDataDir: Type.Optional(Type.String()),
    remoteOutputDir: Type.Optional(Type.String()),
    localBaseDir: Type.Optional(
      Type.String({ description: "Local project directory, relative to the config file" }),
    ),
    training: Type.Optional(TrainingSectionSchema),
    inference: Type.Optional(InferenceSectionSchema),
  },
  { additionalProperties: false },
);

export const LabConfigSchema = Type.Object(
  {
    defaultProfile: Type.Optional(Type.String()),
    profiles: Type.Record(Type.String(), ProfileSchema),
  },
  { additionalProperties: false },
);

type RawProfile = Static<typeof ProfileSchema>;

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function required(value: string | undefined, field: string): string {
  const trimmed = text(value);
  if (!trimmed) {
    throw new ConfigError(`${field} is required`);
  }
  return trimmed;
}

export function userFromHost(host: string): string | undefined {
  const at = host.indexOf("@");
  return at > 0 ? host.slice(0, at) : undefined;
}

function parseTraining(id: string, raw: RawProfile["training"]): TrainingDefaults {
  return {
    script: text(raw?.script) ?? "scripts/run_training.sh",
    jobName: text(raw?.jobName) ?? `${id}_training`,
    trainDataset: text(raw?.trainDataset) ?? "data/train.jsonl",
    valDataset: text(raw?.valDataset) ?? "data/validation.jsonl",
    configFile: text(raw?.configFile) ?? "configs/train.yaml",
    outputName: text(raw?.outputName) ?? `${id}_lora`,
    wandbProject: text(raw?.wandbProject) ?? id,
  };
}

function parseInference(id: string, raw: RawProfile["inference"]): InferenceDefaults {
  return {
    script: text(raw?.script) ?? "scripts/run_inference.sh",
    jobName: text(raw?.jobName) ?? `${id}_inference`,
    inputFile: text(raw?.inputFile) ?? "data/test.jsonl",
    configFile: text(raw?.configFile) ?? "configs/infer.yaml",
    outputName: text(raw?.outputName) ?? "output",
  };
}

// Remote directories are shell-quoted in every command, so they must not rely on `~`.
function absoluteRemoteDir(dir: string, field: string): string {
  if (!dir.startsWith("/")) {
    throw new ConfigError(`${field} must be an absolute path on the cluster (got "${dir}")`);
  }
  return dir.length > 1 ? dir.replace(/\/+$/, "") : dir;
}

function optionalRemoteDir(value: string | undefined, field: string): string | undefined {
  const dir = text(value);
  return dir === undefined ? undefined : absoluteRemoteDir(dir, field);
}

function parseProfile(id: string, raw: RawProfile, configDir: string): LabProfile {
  const base = `profiles.${id}`;
  const clusterHost = required(raw.clusterHost, `${base}.clusterHost`);
  const remoteBaseDir = absoluteRemoteDir(
    required(raw.remoteBaseDir, `${base}.remoteBaseDir`),
    `${base}.remoteBaseDir`,
  );

  return {
    id,
    clusterHost,
    clusterUser: text(raw.clusterUser) ?? userFromHost(clusterHost),
    remoteBaseDir,
    remoteDataDir:
      optionalRemoteDir(raw.remoteDataDir, `${base}.remoteDataDir`) ??
      toPosixRemotePath(remoteBaseDir, "data"),
    remoteOutputDir:
      optionalRemoteDir(raw.remoteOutputDir, `${base}.remoteOutputDir`) ??
      toPosixRemotePath(remoteBaseDir, "output"),
    localBaseDir: path.resolve(configDir, text(raw.localBaseDir) ?? "."),
    training: parseTraining(id, raw.training),
    inference: parseInference(id, raw.inference),
  };
}

/**
 * Validates a parsed config document. Relative `localBaseDir` values are resolved
 * against `configDir`.
 */
export function parseLabConfig(value: unknown, configDir: string = process.cwd()): LabConfig {
  if (!Value.Check(LabConfigSchema, value)) {
    const first = Value.Errors(LabConfigSchema, value).First();
    const where = first?.path ? first.path : "config";
    throw new ConfigError(`${where}: ${first?.message ?? "invalid configuration"}`);
  }

  const profiles: Record<string, LabProfile> = {};
  for (const [id, entry] of Object.entries(value.profiles)) {
    const trimmedId = id.trim();
    if (!trimmedId) {
      continue;
    }
    profiles[trimmedId] = parseProfile(trimmedId, entry, configDir);
  }

  const defaultProfile = text(value.defaultProfile);
  if (defaultProfile && !profiles[defaultProfile]) {
    throw new ConfigError(
      `defaultProfile "${defaultProfile}" does not exist in profiles (${Object.keys(profiles).join(", ") || "none"})`,
    );
  }

  return { defaultProfile, profiles };
}

export async function loadLabConfig(file: string = DEFAULT_CONFIG_FILE): Promise<LabConfig> {
  const resolved = path.resolve(file);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${resolved}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file ${resolved} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseLabConfig(parsed, path.dirname(resolved));
}

export function selectProfile(config: LabConfig, requested?: string): LabProfile {
  const effective = text(requested) ?? config.defaultProfile;
  if (effective) {
    const profile = config.profiles[effective];
    if (!profile) {
      throw new ConfigError(
        `Unknown profile "${effective}". Available: ${Object.keys(config.profiles).join(", ") || "none"}`,
      );
    }
    return profile;
  }
  const all = Object.values(config.profiles);
  const only = all[0];
  if (all.length === 1 && only) {
    return only;
  }
  throw new ConfigError("profile is required (no defaultProfile configured)");
}
