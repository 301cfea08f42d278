import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveInferenceArgs, resolveTrainingArgs } from "./args.js";
import { parseLabConfig, selectProfile } from "./config.js";
import {
  CredentialMissingError,
  DiscoveryError,
  MissingFileError,
  UsageError,
} from "./errors.js";
import { localArtifactProbe } from "./probe.js";
import type { RemoteQuery } from "./remote.js";
import { LabService } from "./service.js";
import type { CommandRunner, EnvSnapshot, LabProfile } from "./types.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

function createMockRunner(submitStdout = "Submitted batch job 48213\n") {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: CommandRunner = vi.fn(async (command: string, args: string[]) => {
    calls.push({ command, args });
    const remoteCmd = args[args.length - 1] ?? "";
    if (command === "ssh" && remoteCmd.includes("sbatch")) {
      return { code: 0, stdout: submitStdout, stderr: "" };
    }
    return { code: 0, stdout: "", stderr: "" };
  });
  return { runner, calls };
}

function createQuery(overrides: Partial<RemoteQuery> = {}): RemoteQuery {
  return {
    listJobs: vi.fn(async () => []),
    listFiles: vi.fn(async () => []),
    fileExists: vi.fn(async () => false),
    ...overrides,
  };
}

async function writeFile(filePath: string, content = "{}\n"): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
}

async function createWorkspace(options: { remoteBaseDir?: string } = {}) {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "slurm-lab-service-"));
  tmpDirs.push(root);
  const local = path.join(root, "project");
  for (const file of [
    "data/train.jsonl",
    "data/validation.jsonl",
    "data/test.jsonl",
    "configs/train.yaml",
    "configs/infer.yaml",
    "scripts/run_training.sh",
    "scripts/run_inference.sh",
  ]) {
    await writeFile(path.join(local, file));
  }

  const config = parseLabConfig(
    {
      profiles: {
        arxiv: {
          clusterHost: "alice@login",
          remoteBaseDir: options.remoteBaseDir ?? "/home/alice/lab/arxiv",
          localBaseDir: local,
          training: { wandbProject: "arxiv-abstract" },
          inference: { outputName: "arxiv_gpt5_article" },
        },
      },
    },
    root,
  );
  return { root, local, profile: selectProfile(config) };
}

const withKey: EnvSnapshot = { wandbApiKey: "test-secret" };

function createService(profile: LabProfile, env: EnvSnapshot, runner: CommandRunner, query = createQuery()) {
  return new LabService({ profile, env, runner, query, probeFor: () => localArtifactProbe });
}

describe("LabService training", () => {
  it("stages files then submits with remote paths and the forwarded credential", async () => {
    const { local, profile } = await createWorkspace();
    const { runner, calls } = createMockRunner();

    const result = await createService(profile, withKey, runner).submitTraining(
      resolveTrainingArgs([], withKey, profile),
    );

    expect(result).toEqual({
      profile: "arxiv",
      host: "alice@login",
      jobId: "48213",
      remoteDir: "/home/alice/lab/arxiv",
      exported: [
        "CONFIG_FILE",
        "TRAIN_DATASET",
        "VAL_DATASET",
        "OUTPUT_NAME",
        "WANDB_PROJECT",
        "WANDB_API_KEY",
      ],
      submitOutput: "Submitted batch job 48213",
    });
    expect(calls.map((call) => call.command)).toEqual(["ssh", "rsync", "ssh"]);
    expect(calls[0]?.args[3]).toBe(
      "mkdir -p '/home/alice/lab/arxiv' '/home/alice/lab/arxiv/logs' '/home/alice/lab/arxiv/output'",
    );
    expect(calls[1]?.args.slice(4)).toEqual([
      path.join(local, "data/train.jsonl"),
      path.join(local, "data/validation.jsonl"),
      path.join(local, "configs/train.yaml"),
      path.join(local, "scripts/run_training.sh"),
      "alice@login:/home/alice/lab/arxiv/",
    ]);
    expect(calls[2]?.args[3]).toBe(
      "cd '/home/alice/lab/arxiv' && sbatch --export='CONFIG_FILE=/home/alice/lab/arxiv/train.yaml,TRAIN_DATASET=/home/alice/lab/arxiv/train.jsonl,VAL_DATASET=/home/alice/lab/arxiv/validation.jsonl,OUTPUT_NAME=arxiv_lora,WANDB_PROJECT=arxiv-abstract,WANDB_API_KEY=test-secret' 'run_training.sh'",
    );
  });

  it("exports the entity, run name and resume checkpoint when given", async () => {
    const { profile } = await createWorkspace();
    const { runner, calls } = createMockRunner();
    const env: EnvSnapshot = { ...withKey, wandbEntity: "vision-team" };

    await createService(profile, env, runner).submitTraining(
      resolveTrainingArgs(["", "", "", "", "", "", "", "sweep-3", "output/arxiv_lora/checkpoint-500"], env, profile),
    );

    expect(calls[2]?.args[3]).toContain(
      ",WANDB_ENTITY=vision-team,RUN_NAME=sweep-3,RESUME_FROM_CHECKPOINT=/home/alice/lab/arxiv/output/arxiv_lora/checkpoint-500,WANDB_API_KEY=test-secret'",
    );
  });

  it("fails before any remote command when the validation dataset is missing", async () => {
    const { local, profile } = await createWorkspace();
    await fs.rm(path.join(local, "data/validation.jsonl"));
    const { runner } = createMockRunner();

    const attempt = createService(profile, withKey, runner).submitTraining(
      resolveTrainingArgs([], withKey, profile),
    );

    await expect(attempt).rejects.toBeInstanceOf(MissingFileError);
    await expect(attempt).rejects.toThrow(
      `Validation dataset not found: ${path.join(local, "data/validation.jsonl")}`,
    );
    expect(runner).not.toHaveBeenCalled();
  });

  it("refuses to submit without a wandb API key", async () => {
    const { profile } = await createWorkspace();
    const { runner } = createMockRunner();

    await expect(
      createService(profile, {}, runner).submitTraining(resolveTrainingArgs([], {}, profile)),
    ).rejects.toBeInstanceOf(CredentialMissingError);
    expect(runner).not.toHaveBeenCalled();
  });

  it("rejects an unexportable run name before touching the cluster", async () => {
    const { profile } = await createWorkspace();
    const { runner, calls } = createMockRunner();

    const attempt = createService(profile, withKey, runner).submitTraining(
      resolveTrainingArgs(["", "", "", "", "", "", "", "a,b"], withKey, profile),
    );

    await expect(attempt).rejects.toBeInstanceOf(UsageError);
    await expect(attempt).rejects.toThrow('RUN_NAME cannot contain ","');
    expect(calls).toEqual([]);
  });

  it("rejects a home-relative resume checkpoint before touching the cluster", async () => {
    const { profile } = await createWorkspace();
    const { runner, calls } = createMockRunner();

    await expect(
      createService(profile, withKey, runner).submitTraining(
        resolveTrainingArgs(["", "", "", "", "", "", "", "", "~/lab/arxiv/output/run"], withKey, profile),
      ),
    ).rejects.toBeInstanceOf(UsageError);
    expect(calls).toEqual([]);
  });

  it("rejects sbatch output without a job id", async () => {
    const { profile } = await createWorkspace();
    const { runner } = createMockRunner("sbatch: error: Batch job submission failed\n");

    await expect(
      createService(profile, withKey, runner).submitTraining(
        resolveTrainingArgs([], withKey, profile),
      ),
    ).rejects.toThrow("Unable to parse job id from sbatch output");
  });
});

describe("LabService inference", () => {
  async function createInferenceWorkspace() {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "slurm-lab-remote-"));
    tmpDirs.push(root);
    const remoteBaseDir = path.join(root, "remote");
    await fs.mkdir(remoteBaseDir, { recursive: true });
    return { remoteBaseDir, ...(await createWorkspace({ remoteBaseDir })) };
  }

  it("submits without CHECKPOINT_PATH when no adapter is given", async () => {
    const { remoteBaseDir, profile } = await createInferenceWorkspace();
    const { runner, calls } = createMockRunner();

    const result = await createService(profile, {}, runner).submitInference(
      resolveInferenceArgs([], profile),
    );

    expect(result.adapter).toBeUndefined();
    expect(result.exported).toEqual(["CONFIG_FILE", "INPUT_PATH", "OUTPUT_NAME"]);
    expect(calls[0]?.args[3]).toBe(`mkdir -p '${remoteBaseDir}' '${remoteBaseDir}/logs'`);
    expect(calls[2]?.args[3]).toBe(
      `cd '${remoteBaseDir}' && sbatch --export='CONFIG_FILE=${remoteBaseDir}/infer.yaml,INPUT_PATH=${remoteBaseDir}/test.jsonl,OUTPUT_NAME=arxiv_gpt5_article' 'run_inference.sh'`,
    );
  });

  it("resolves the adapter to its latest checkpoint before submitting", async () => {
    const { remoteBaseDir, profile } = await createInferenceWorkspace();
    const checkpoint = path.join(remoteBaseDir, "output", "run_42", "checkpoint-10");
    await writeFile(path.join(checkpoint, "adapter_config.json"));
    await writeFile(path.join(remoteBaseDir, "output", "run_42", "checkpoint-9", "adapter_config.json"));
    const { runner, calls } = createMockRunner();

    const result = await createService(profile, {}, runner).submitInference(
      resolveInferenceArgs(["", "", "", "output/run_42"], profile),
    );

    expect(result.adapter).toEqual({ path: checkpoint, strategy: "checkpoint-subdir" });
    expect(calls[2]?.args[3]).toContain(`,CHECKPOINT_PATH=${checkpoint}'`);
  });

  it("rejects an unexportable output name before staging files", async () => {
    const { profile } = await createInferenceWorkspace();
    const { runner, calls } = createMockRunner();

    await expect(
      createService(profile, {}, runner).submitInference(
        resolveInferenceArgs(["", "", "summaries,v2"], profile),
      ),
    ).rejects.toThrow('OUTPUT_NAME cannot contain ","');
    expect(calls).toEqual([]);
  });

  it("does not stage anything when the adapter cannot be found", async () => {
    const { profile } = await createInferenceWorkspace();
    const { runner } = createMockRunner();

    await expect(
      createService(profile, {}, runner).submitInference(
        resolveInferenceArgs(["", "", "", "output/missing_run"], profile),
      ),
    ).rejects.toBeInstanceOf(DiscoveryError);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe("LabService job control", () => {
  it("looks up the newest job for the profile's job name and queue user", async () => {
    const { profile } = await createWorkspace();
    const { runner } = createMockRunner();
    const query = createQuery();

    const outcome = await createService(profile, {}, runner, query).kill({
      kind: "kill",
      jobKind: "training",
      clusterHost: "bob@gpu",
    });

    expect(outcome).toEqual({ outcome: "not_found", host: "bob@gpu", jobName: "arxiv_training" });
    expect(query.listJobs).toHaveBeenCalledWith("bob@gpu", { user: "bob", name: "arxiv_training" });
  });

  it("searches the profile's remote data directory for outputs", async () => {
    const { profile } = await createWorkspace();
    const { runner } = createMockRunner();
    const query = createQuery();

    const outcome = await createService(profile, {}, runner, query).download({
      kind: "download",
      outputName: "arxiv_gpt5_article",
      clusterHost: "alice@login",
    });

    expect(outcome).toEqual({
      outcome: "not_found",
      host: "alice@login",
      remoteDir: "/home/alice/lab/arxiv/data",
      patterns: ["arxiv_gpt5_article_*.jsonl", "*_*.jsonl"],
    });
    expect(query.listFiles).toHaveBeenCalledWith(
      "alice@login",
      "/home/alice/lab/arxiv/data",
      "arxiv_gpt5_article_*.jsonl",
    );
  });
});
