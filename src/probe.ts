import fs from "node:fs/promises";
import path from "node:path";
import { remoteBasename } from "./paths.js";
import { shellQuote, sshExec, sshTest } from "./shell.js";
import type { CommandRunner } from "./types.js";

/** Read-only view of the filesystem that holds training artifacts. */
export interface ArtifactProbe {
  /** Joins path segments the way the probed filesystem does. */
  join(...parts: string[]): string;
  basename(target: string): string;
  exists(target: string): Promise<boolean>;
  isDirectory(target: string): Promise<boolean>;
  /** Names of the immediate subdirectories of `dir`. */
  listDirectories(dir: string): Promise<string[]>;
}

export const localArtifactProbe: ArtifactProbe = {
  join: (...parts) => path.join(...parts),
  basename: (target) => path.basename(target),
  async exists(target) {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  },
  async isDirectory(target) {
    try {
      return (await fs.stat(target)).isDirectory();
    } catch {
      return false;
    }
  },
  async listDirectories(dir) {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  },
};

export function createRemoteArtifactProbe(runner: CommandRunner, host: string): ArtifactProbe {
  return {
    join: (...parts) => path.posix.join(...parts),
    basename: (target) => remoteBasename(target),
    exists: async (target) => await sshTest(runner, host, `test -e ${shellQuote(target)}`),
    isDirectory: async (target) => await sshTest(runner, host, `test -d ${shellQuote(target)}`),
    async listDirectories(dir) {
      const result = await sshExec(
        runner,
        host,
        `find ${shellQuote(dir)} -mindepth 1 -maxdepth 1 -type d -printf '%f\\n'`,
      );
      return result.stdout
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    },
  };
}
