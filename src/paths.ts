import fs from "node:fs/promises";
import path from "node:path";
import { ResolutionError, UsageError } from "./errors.js";
import type { ResolvedPath } from "./types.js";

async function canonicalDirectory(dirPath: string): Promise<string | undefined> {
  try {
    const real = await fs.realpath(dirPath);
    const stat = await fs.stat(real);
    return stat.isDirectory() ? real : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Turns a user-supplied local path into an absolute one.
 *
 * Absolute paths pass through. Paths starting with `../` are taken relative to the
 * directory the tool was invoked from, everything else relative to the profile's
 * local base directory.
 */
export async function normalizeLocalPath(
  input: string,
  localBaseDir: string,
  cwd: string = process.cwd(),
): Promise<ResolvedPath> {
  if (path.isAbsolute(input)) {
    return { path: input, strategy: "absolute" };
  }

  if (input.startsWith("../")) {
    const dir = path.dirname(input);
    const resolvedDir = await canonicalDirectory(path.resolve(cwd, dir));
    if (!resolvedDir) {
      throw new ResolutionError(input, dir);
    }
    return { path: path.join(resolvedDir, path.basename(input)), strategy: "parent-relative-cwd" };
  }

  return { path: path.join(localBaseDir, input), strategy: "local-base" };
}

export function toPosixRemotePath(...parts: string[]): string {
  const cleaned = parts
    .filter((part) => part.trim().length > 0)
    .map((part) => part.replace(/\\/g, "/"));
  return cleaned.join("/").replace(/\/+/g, "/");
}

/**
 * Remote paths are quoted before they reach the remote shell, so `~` would never
 * expand. Only absolute paths and paths relative to `remoteBaseDir` are accepted.
 */
export function resolveRemotePath(input: string, remoteBaseDir: string): string {
  const normalized = input.replace(/\\/g, "/");
  if (normalized.startsWith("~")) {
    throw new UsageError(
      `Remote path "${input}" starts with "~"; use an absolute path or one relative to ${remoteBaseDir}`,
    );
  }
  if (normalized.startsWith("/")) {
    return normalized;
  }
  return toPosixRemotePath(remoteBaseDir, normalized);
}

export function remoteBasename(remotePath: string): string {
  return path.posix.basename(remotePath.replace(/\/+$/, ""));
}
