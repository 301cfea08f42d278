import type {
  AdapterHostArgument,
  DownloadRequest,
  EnvSnapshot,
  InferenceRequest,
  JobKind,
  KillRequest,
  LabProfile,
  PositionalSlot,
  Resolved,
  TrainingRequest,
} from "./types.js";

/** Slot `index` (0-based): absent when fewer arguments were passed, given otherwise (even if ""). */
export function slotAt(args: readonly string[], index: number): PositionalSlot {
  const value = args[index];
  return index < args.length && value !== undefined ? { kind: "given", value } : { kind: "absent" };
}

function nonEmpty(slot: PositionalSlot): string | undefined {
  return slot.kind === "given" && slot.value.length > 0 ? slot.value : undefined;
}

function positional(args: readonly string[], index: number, fallback: string): string {
  return nonEmpty(slotAt(args, index)) ?? fallback;
}

/**
 * Resolution for fields that accept an explicit argument, an environment variable
 * and a built-in default, in that order. Passing "" in the slot is how a caller
 * asks for the environment/default while still filling later slots.
 */
export function resolveOverride<T extends string | undefined>(
  slot: PositionalSlot,
  envValue: string | undefined,
  fallback: T,
): Resolved<string | T> {
  const explicit = nonEmpty(slot);
  if (explicit !== undefined) {
    return { value: explicit, source: "argument" };
  }
  if (envValue !== undefined && envValue.length > 0) {
    return { value: envValue, source: "environment" };
  }
  return { value: fallback, source: "default" };
}

/**
 * The inference command shares one slot between an adapter path and a host. A value
 * containing `@` is a host; anything else non-empty is an adapter path, with the
 * host in the following slot.
 */
export function parseAdapterHostArgument(
  adapterOrHost: PositionalSlot,
  nextSlot: PositionalSlot,
): AdapterHostArgument {
  const value = nonEmpty(adapterOrHost);
  if (value === undefined) {
    return { kind: "none", host: nonEmpty(nextSlot) };
  }
  if (value.includes("@")) {
    return { kind: "host-only", host: value };
  }
  return { kind: "checkpoint-then-host", checkpointPath: value, host: nonEmpty(nextSlot) };
}

export function resolveTrainingArgs(
  args: readonly string[],
  env: EnvSnapshot,
  profile: LabProfile,
): TrainingRequest {
  const defaults = profile.training;
  return Object.freeze({
    kind: "submit-training",
    trainDataset: positional(args, 0, defaults.trainDataset),
    valDataset: positional(args, 1, defaults.valDataset),
    configFile: positional(args, 2, defaults.configFile),
    outputName: positional(args, 3, defaults.outputName),
    clusterHost: positional(args, 4, profile.clusterHost),
    wandbProject: resolveOverride(slotAt(args, 5), env.wandbProject, defaults.wandbProject),
    wandbEntity: resolveOverride(slotAt(args, 6), env.wandbEntity, undefined),
    runName: resolveOverride(slotAt(args, 7), env.runName, undefined),
    resumeFromCheckpoint: resolveOverride(slotAt(args, 8), env.resumeFromCheckpoint, undefined),
  });
}

export function resolveInferenceArgs(
  args: readonly string[],
  profile: LabProfile,
): InferenceRequest {
  const defaults = profile.inference;
  const adapterHost = parseAdapterHostArgument(slotAt(args, 3), slotAt(args, 4));
  const base = {
    kind: "submit-inference" as const,
    inputFile: positional(args, 0, defaults.inputFile),
    configFile: positional(args, 1, defaults.configFile),
    outputName: positional(args, 2, defaults.outputName),
  };

  switch (adapterHost.kind) {
    case "host-only":
      return Object.freeze({ ...base, clusterHost: adapterHost.host });
    case "checkpoint-then-host":
      return Object.freeze({
        ...base,
        checkpointPath: adapterHost.checkpointPath,
        clusterHost: adapterHost.host ?? profile.clusterHost,
      });
    case "none":
      return Object.freeze({ ...base, clusterHost: adapterHost.host ?? profile.clusterHost });
    default:
      adapterHost satisfies never;
      throw new Error("Unsupported adapter/host argument");
  }
}

export function resolveKillArgs(
  args: readonly string[],
  jobKind: JobKind,
  profile: LabProfile,
): KillRequest {
  return Object.freeze({
    kind: "kill",
    jobKind,
    jobId: nonEmpty(slotAt(args, 0)),
    clusterHost: positional(args, 1, profile.clusterHost),
  });
}

export function resolveDownloadArgs(args: readonly string[], profile: LabProfile): DownloadRequest {
  return Object.freeze({
    kind: "download",
    jobId: nonEmpty(slotAt(args, 0)),
    outputName: positional(args, 1, profile.inference.outputName),
    clusterHost: positional(args, 2, profile.clusterHost),
  });
}
