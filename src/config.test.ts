import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadLabConfig, parseLabConfig, selectProfile } from "./config.js";
import { ConfigError } from "./errors.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

describe("lab config", () => {
  it("fills profile defaults from the profile id and base directory", () => {
    const config = parseLabConfig(
      { profiles: { arxiv: { clusterHost: "alice@login", remoteBaseDir: "/home/alice/lab/" } } },
      "/work",
    );
    expect(config.profiles.arxiv).toEqual({
      id: "arxiv",
      clusterHost: "alice@login",
      clusterUser: "alice",
      remoteBaseDir: "/home/alice/lab",
      remoteDataDir: "/home/alice/lab/data",
      remoteOutputDir: "/home/alice/lab/output",
      localBaseDir: "/work",
      training: {
        script: "scripts/run_training.sh",
        jobName: "arxiv_training",
        trainDataset: "data/train.jsonl",
        valDataset: "data/validation.jsonl",
        configFile: "configs/train.yaml",
        outputName: "arxiv_lora",
        wandbProject: "arxiv",
      },
      inference: {
        script: "scripts/run_inference.sh",
        jobName: "arxiv_inference",
        inputFile: "data/test.jsonl",
        configFile: "configs/infer.yaml",
        outputName: "output",
      },
    });
  });

  it("rejects unknown keys with the offending path", () => {
    expect(() =>
      parseLabConfig({
        profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "/r", partition: "gpu" } },
      }),
    ).toThrow(ConfigError);
  });

  it("rejects blank required fields", () => {
    expect(() =>
      parseLabConfig({ profiles: { arxiv: { clusterHost: " ", remoteBaseDir: "/r" } } }),
    ).toThrow("profiles.arxiv.clusterHost is required");
  });

  it("requires absolute remote directories", () => {
    expect(() =>
      parseLabConfig({ profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "~/lab/arxiv" } } }),
    ).toThrow('profiles.arxiv.remoteBaseDir must be an absolute path on the cluster (got "~/lab/arxiv")');
    expect(() =>
      parseLabConfig({
        profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "/r", remoteDataDir: "data" } },
      }),
    ).toThrow(ConfigError);
    expect(
      parseLabConfig({
        profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "/r", remoteOutputDir: "/scratch/out/" } },
      }).profiles.arxiv?.remoteOutputDir,
    ).toBe("/scratch/out");
  });

  it("rejects a default profile that is not defined", () => {
    expect(() =>
      parseLabConfig({
        defaultProfile: "missing",
        profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "/r" } },
      }),
    ).toThrow('defaultProfile "missing" does not exist in profiles (arxiv)');
  });

  it("selects the requested, default, or only profile", () => {
    const two = parseLabConfig({
      profiles: {
        a: { clusterHost: "h", remoteBaseDir: "/a" },
        b: { clusterHost: "h", remoteBaseDir: "/b" },
      },
    });
    expect(selectProfile(two, "b").remoteBaseDir).toBe("/b");
    expect(() => selectProfile(two)).toThrow("profile is required");
    expect(() => selectProfile(two, "c")).toThrow('Unknown profile "c". Available: a, b');

    const withDefault = { ...two, defaultProfile: "a" };
    expect(selectProfile(withDefault).id).toBe("a");

    const one = parseLabConfig({ profiles: { only: { clusterHost: "h", remoteBaseDir: "/o" } } });
    expect(selectProfile(one).id).toBe("only");
  });

  it("loads a file and resolves localBaseDir next to it", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "slurm-lab-config-"));
    tmpDirs.push(dir);
    const file = path.join(dir, "lab.config.json");
    await fs.writeFile(
      file,
      JSON.stringify({
        profiles: { arxiv: { clusterHost: "h", remoteBaseDir: "/r", localBaseDir: "project" } },
      }),
      "utf8",
    );

    const config = await loadLabConfig(file);
    expect(config.profiles.arxiv?.localBaseDir).toBe(path.join(dir, "project"));
  });

  it("reports unreadable and malformed files as config errors", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "slurm-lab-config-"));
    tmpDirs.push(dir);
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json", "utf8");

    await expect(loadLabConfig(file)).rejects.toThrow(`Config file ${file} is not valid JSON`);
    await expect(loadLabConfig(path.join(dir, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});
