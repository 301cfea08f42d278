import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { MissingRemoteFileError } from "./errors.js";
import { toPosixRemotePath } from "./paths.js";
import type { RemoteQuery } from "./remote.js";
import { shellQuote, scpDownload, sshExec } from "./shell.js";
import type { CommandRunner } from "./types.js";

const OUTPUT_JOB_ID_SUFFIX = /_(\d+)\.jsonl$/;

export function outputFilename(outputName: string, jobId: string): string {
  return `${outputName}_${jobId}.jsonl`;
}

/** Recovers the job id from the last `_<digits>.jsonl` suffix, so names may contain underscores. */
export function parseJobIdFromFilename(filename: string): string | undefined {
  return OUTPUT_JOB_ID_SUFFIX.exec(path.posix.basename(filename))?.[1];
}

export type CancelOutcome =
  | {
      outcome: "cancelled";
      host: string;
      jobId: string;
      selectedBy: "explicit" | "latest";
      output: string;
    }
  | { outcome: "not_found"; host: string; jobName: string };

export async function cancelJob(params: {
  runner: CommandRunner;
  query: RemoteQuery;
  host: string;
  user?: string;
  jobName: string;
  jobId?: string;
}): Promise<CancelOutcome> {
  const explicit = params.jobId?.trim();
  let jobId: string;
  let selectedBy: "explicit" | "latest";

  if (explicit) {
    jobId = explicit;
    selectedBy = "explicit";
  } else {
    const jobs = await params.query.listJobs(params.host, {
      user: params.user,
      name: params.jobName,
    });
    const latest = jobs[0];
    if (!latest) {
      return { outcome: "not_found", host: params.host, jobName: params.jobName };
    }
    jobId = latest.jobId;
    selectedBy = "latest";
  }

  const result = await sshExec(params.runner, params.host, `scancel ${shellQuote(jobId)}`);
  return {
    outcome: "cancelled",
    host: params.host,
    jobId,
    selectedBy,
    output: (result.stdout || result.stderr).trim(),
  };
}

export type DownloadOutcome =
  | {
      outcome: "downloaded";
      host: string;
      remotePath: string;
      localPath: string;
      jobId?: string;
      pattern?: string;
      sizeBytes: number;
      lines: number;
    }
  | { outcome: "not_found"; host: string; remoteDir: string; patterns: string[] };

export async function describeLocalFile(
  filePath: string,
): Promise<{ sizeBytes: number; lines: number }> {
  const stat = await fs.stat(filePath);
  let lines = 0;
  for await (const chunk of createReadStream(filePath)) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    for (const byte of buffer) {
      if (byte === 0x0a) {
        lines += 1;
      }
    }
  }
  return { sizeBytes: stat.size, lines };
}

async function fetchTo(
  runner: CommandRunner,
  host: string,
  remotePath: string,
  localDir: string,
): Promise<{ localPath: string; sizeBytes: number; lines: number }> {
  await fs.mkdir(localDir, { recursive: true });
  const localPath = path.join(localDir, path.posix.basename(remotePath));
  await scpDownload(runner, host, remotePath, localPath);
  return { localPath, ...(await describeLocalFile(localPath)) };
}

export async function downloadOutput(params: {
  runner: CommandRunner;
  query: RemoteQuery;
  host: string;
  remoteDataDir: string;
  localDataDir: string;
  outputName: string;
  jobId?: string;
}): Promise<DownloadOutcome> {
  const explicit = params.jobId?.trim();

  if (explicit) {
    const remotePath = toPosixRemotePath(
      params.remoteDataDir,
      outputFilename(params.outputName, explicit),
    );
    if (!(await params.query.fileExists(params.host, remotePath))) {
      throw new MissingRemoteFileError(params.host, remotePath);
    }
    const fetched = await fetchTo(params.runner, params.host, remotePath, params.localDataDir);
    return { outcome: "downloaded", host: params.host, remotePath, jobId: explicit, ...fetched };
  }

  const patterns = [`${params.outputName}_*.jsonl`, "*_*.jsonl"];
  for (const pattern of patterns) {
    const files = await params.query.listFiles(params.host, params.remoteDataDir, pattern);
    const newest = files[0];
    if (!newest) {
      continue;
    }
    const fetched = await fetchTo(params.runner, params.host, newest.path, params.localDataDir);
    return {
      outcome: "downloaded",
      host: params.host,
      remotePath: newest.path,
      jobId: parseJobIdFromFilename(newest.path),
      pattern,
      ...fetched,
    };
  }

  return {
    outcome: "not_found",
    host: params.host,
    remoteDir: params.remoteDataDir,
    patterns,
  };
}
