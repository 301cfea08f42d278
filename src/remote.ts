import { shellQuote, sshExec, sshTest } from "./shell.js";
import type { CommandRunner, RemoteFile, RemoteJob } from "./types.js";

/** Structured queries against the cluster. Results come back already sorted newest first. */
export interface RemoteQuery {
  listJobs(host: string, filter: { user?: string; name: string }): Promise<RemoteJob[]>;
  listFiles(host: string, dir: string, pattern: string): Promise<RemoteFile[]>;
  fileExists(host: string, remotePath: string): Promise<boolean>;
}

function numericId(jobId: string): number {
  const match = /^(\d+)/.exec(jobId);
  return match?.[1] ? Number(match[1]) : -1;
}

/** Latest submit time first; jobs without one go last; ties fall back to the larger job id. */
export function compareJobsNewestFirst(a: RemoteJob, b: RemoteJob): number {
  if (a.submitTime && b.submitTime && a.submitTime !== b.submitTime) {
    return a.submitTime < b.submitTime ? 1 : -1;
  }
  if (Boolean(a.submitTime) !== Boolean(b.submitTime)) {
    return a.submitTime ? -1 : 1;
  }
  return numericId(b.jobId) - numericId(a.jobId);
}

export function compareFilesNewestFirst(a: RemoteFile, b: RemoteFile): number {
  if (a.modifiedAt !== b.modifiedAt) {
    return b.modifiedAt - a.modifiedAt;
  }
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export function parseSqueueJobs(stdout: string): RemoteJob[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [jobId, name, submitTime] = line.split("|");
      const submitted = submitTime?.trim();
      return {
        jobId: (jobId ?? "").trim(),
        name: (name ?? "").trim(),
        submitTime: submitted && submitted !== "N/A" ? submitted : undefined,
      };
    })
    .filter((job) => job.jobId.length > 0);
}

export function parseFileListing(stdout: string): RemoteFile[] {
  const files: RemoteFile[] = [];
  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    const space = line.indexOf(" ");
    if (space <= 0) {
      continue;
    }
    const modifiedAt = Number(line.slice(0, space));
    const filePath = line.slice(space + 1).trim();
    if (Number.isFinite(modifiedAt) && filePath.length > 0) {
      files.push({ path: filePath, modifiedAt });
    }
  }
  return files;
}

export function createSshRemoteQuery(runner: CommandRunner): RemoteQuery {
  return {
    async listJobs(host, filter) {
      const user = filter.user ? shellQuote(filter.user) : '"$USER"';
      const cmd = `squeue -h -u ${user} -n ${shellQuote(filter.name)} -o '%i|%j|%V'`;
      const result = await sshExec(runner, host, cmd);
      return parseSqueueJobs(result.stdout).sort(compareJobsNewestFirst);
    },

    async listFiles(host, dir, pattern) {
      const quotedDir = shellQuote(dir);
      const cmd = `if [ -d ${quotedDir} ]; then find ${quotedDir} -maxdepth 1 -type f -name ${shellQuote(pattern)} -printf '%T@ %p\\n'; fi`;
      const result = await sshExec(runner, host, cmd);
      return parseFileListing(result.stdout).sort(compareFilesNewestFirst);
    },

    async fileExists(host, remotePath) {
      return await sshTest(runner, host, `test -f ${shellQuote(remotePath)}`);
    },
  };
}
