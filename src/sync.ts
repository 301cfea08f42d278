import fs from "node:fs/promises";
import { MissingFileError } from "./errors.js";
import { toPosixRemotePath } from "./paths.js";
import { rsyncUpload, shellQuote, sshExec } from "./shell.js";
import type { CommandRunner } from "./types.js";

export type StagedFile = {
  label: string;
  path: string;
};

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/** Checks files in order and stops at the first one that is missing. */
export async function verifyLocalFiles(files: readonly StagedFile[]): Promise<void> {
  for (const file of files) {
    if (!(await isFile(file.path))) {
      throw new MissingFileError(file.label, file.path);
    }
  }
}

export function remoteMkdirCommand(remoteDir: string, subdirs: readonly string[]): string {
  const dirs = [remoteDir, ...subdirs.map((sub) => toPosixRemotePath(remoteDir, sub))];
  return `mkdir -p ${dirs.map((dir) => shellQuote(dir)).join(" ")}`;
}

/**
 * Stages files into a flat remote directory. Every local file is checked before the
 * first remote command runs.
 */
export async function syncFiles(params: {
  runner: CommandRunner;
  host: string;
  remoteDir: string;
  subdirs: readonly string[];
  files: readonly StagedFile[];
}): Promise<{ remoteDir: string; transferred: string[] }> {
  await verifyLocalFiles(params.files);

  await sshExec(params.runner, params.host, remoteMkdirCommand(params.remoteDir, params.subdirs));

  const localPaths = params.files.map((file) => file.path);
  await rsyncUpload(params.runner, params.host, localPaths, params.remoteDir);

  return { remoteDir: params.remoteDir, transferred: localPaths };
}
