import { DiscoveryError } from "./errors.js";
import type { ArtifactProbe } from "./probe.js";
import type { AdapterLocation } from "./types.js";

export const ADAPTER_DESCRIPTOR = "adapter_config.json";

const CHECKPOINT_DIR_PATTERN = /^checkpoint-(.+)$/;

function versionTokens(version: string): Array<number | string> {
  return (version.match(/\d+|\D+/g) ?? []).map((token) =>
    /^\d+$/.test(token) ? Number(token) : token,
  );
}

/** Natural ordering: digit runs compare numerically, so "10" sorts after "9". */
export function compareVersions(a: string, b: string): number {
  const left = versionTokens(a);
  const right = versionTokens(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const l = left[i];
    const r = right[i];
    if (l === r || l === undefined || r === undefined) {
      continue;
    }
    if (typeof l === "number" && typeof r === "number") {
      return l - r;
    }
    return String(l) < String(r) ? -1 : 1;
  }
  return left.length - right.length;
}

export function checkpointVersion(dirName: string): string | undefined {
  return CHECKPOINT_DIR_PATTERN.exec(dirName)?.[1];
}

/** Picks the highest-versioned `checkpoint-*` name, or undefined when there is none. */
export function latestCheckpointDir(dirNames: string[]): string | undefined {
  const versioned = dirNames
    .map((name) => ({ name, version: checkpointVersion(name) }))
    .filter((entry): entry is { name: string; version: string } => entry.version !== undefined)
    .sort((a, b) => compareVersions(a.version, b.version));
  return versioned[versioned.length - 1]?.name;
}

async function findInRoot(
  root: string,
  probe: ArtifactProbe,
): Promise<{ path: string; viaCheckpoint: boolean } | undefined> {
  if (await probe.exists(probe.join(root, ADAPTER_DESCRIPTOR))) {
    return { path: root, viaCheckpoint: false };
  }

  if (!(await probe.isDirectory(root))) {
    return undefined;
  }

  const latest = latestCheckpointDir(await probe.listDirectories(root));
  if (!latest) {
    return undefined;
  }
  const checkpointDir = probe.join(root, latest);
  if (await probe.exists(probe.join(checkpointDir, ADAPTER_DESCRIPTOR))) {
    return { path: checkpointDir, viaCheckpoint: true };
  }
  return undefined;
}

export function outputRootFallback(candidate: string, outputRoot: string, probe: ArtifactProbe) {
  return probe.join(outputRoot, probe.basename(candidate));
}

/**
 * Finds the directory holding a trained adapter for `candidate`.
 *
 * Looks at the candidate itself, then its latest `checkpoint-*` subdirectory, then
 * the same two places under `{outputRoot}/{basename(candidate)}`. The first hit wins.
 */
export async function locateAdapter(
  candidate: string,
  outputRoot: string,
  probe: ArtifactProbe,
): Promise<AdapterLocation> {
  const direct = await findInRoot(candidate, probe);
  if (direct) {
    return {
      path: direct.path,
      strategy: direct.viaCheckpoint ? "checkpoint-subdir" : "direct",
    };
  }

  const fallback = outputRootFallback(candidate, outputRoot, probe);
  if (await probe.isDirectory(fallback)) {
    const found = await findInRoot(fallback, probe);
    if (found) {
      return {
        path: found.path,
        strategy: found.viaCheckpoint ? "output-root-checkpoint-subdir" : "output-root-direct",
      };
    }
  }

  throw new DiscoveryError(candidate, fallback);
}
