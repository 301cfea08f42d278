import path from "node:path";
import { describeFailure, runChecked } from "./exec.js";
import { CommandError, TransferError } from "./errors.js";
import type { CommandResult, CommandRunner } from "./types.js";

const SSH_OPTIONS = ["-o", "BatchMode=yes"];

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function remoteTarget(host: string, remotePath: string): string {
  return `${host}:${remotePath.replace(/\\/g, "/")}`;
}

export async function sshExec(
  runner: CommandRunner,
  host: string,
  remoteCommand: string,
): Promise<CommandResult> {
  return await runChecked(runner, "ssh", [...SSH_OPTIONS, host, remoteCommand]);
}

/** Runs a remote test command and reports whether it exited 0. */
export async function sshTest(
  runner: CommandRunner,
  host: string,
  remoteCommand: string,
): Promise<boolean> {
  const result = await runner("ssh", [...SSH_OPTIONS, host, remoteCommand]);
  // 255 is ssh's own failure (connection, auth), not the remote test's answer
  if (result.code === 255) {
    throw new CommandError("ssh", result.code, describeFailure(result));
  }
  return result.code === 0;
}

export async function rsyncUpload(
  runner: CommandRunner,
  host: string,
  localPaths: string[],
  remoteDir: string,
): Promise<CommandResult> {
  const destination = remoteDir.endsWith("/") ? remoteDir : `${remoteDir}/`;
  const args = [
    "-az",
    "--checksum",
    "-e",
    `ssh ${SSH_OPTIONS.join(" ")}`,
    ...localPaths,
    remoteTarget(host, destination),
  ];
  const result = await runner("rsync", args);
  if (result.code !== 0) {
    throw new TransferError(host, describeFailure(result));
  }
  return result;
}

export async function scpDownload(
  runner: CommandRunner,
  host: string,
  remotePath: string,
  localDestination: string,
): Promise<CommandResult> {
  const args = [...SSH_OPTIONS, remoteTarget(host, remotePath), path.resolve(localDestination)];
  const result = await runner("scp", args);
  if (result.code !== 0) {
    throw new TransferError(host, describeFailure(result));
  }
  return result;
}
