import path from "node:path";
import { locateAdapter } from "./checkpoint.js";
import { userFromHost } from "./config.js";
import { CredentialMissingError } from "./errors.js";
import { defaultCommandRunner } from "./exec.js";
import { cancelJob, downloadOutput } from "./lifecycle.js";
import type { CancelOutcome, DownloadOutcome } from "./lifecycle.js";
import { silentLogger, type Logger } from "./logger.js";
import { normalizeLocalPath, resolveRemotePath, toPosixRemotePath } from "./paths.js";
import { createRemoteArtifactProbe, type ArtifactProbe } from "./probe.js";
import { createSshRemoteQuery, type RemoteQuery } from "./remote.js";
import { sshExec } from "./shell.js";
import {
  buildInferenceExports,
  buildSubmitCommand,
  buildTrainingExports,
  parseSubmittedJobId,
  type ExportVariableSet,
} from "./submit.js";
import { syncFiles, verifyLocalFiles, type StagedFile } from "./sync.js";
import type {
  AdapterLocation,
  CommandRunner,
  DownloadRequest,
  EnvSnapshot,
  InferenceRequest,
  KillRequest,
  LabProfile,
  TrainingRequest,
} from "./types.js";

const WANDB_KEY_REMEDIATION =
  "Export it in your local shell before submitting (export WANDB_API_KEY=...); keys are listed at https://wandb.ai/authorize.";

export type LabServiceParams = {
  profile: LabProfile;
  env: EnvSnapshot;
  runner?: CommandRunner;
  query?: RemoteQuery;
  /** Builds the probe used to find adapters; defaults to SSH against the job's host. */
  probeFor?: (host: string) => ArtifactProbe;
  logger?: Logger;
  cwd?: string;
};

export type SubmitResult = {
  profile: string;
  host: string;
  jobId: string;
  remoteDir: string;
  exported: string[];
  submitOutput: string;
  adapter?: AdapterLocation;
};

export class LabService {
  private readonly profile: LabProfile;
  private readonly env: EnvSnapshot;
  private readonly runner: CommandRunner;
  private readonly query: RemoteQuery;
  private readonly probeFor: (host: string) => ArtifactProbe;
  private readonly logger: Logger;
  private readonly cwd: string;

  constructor(params: LabServiceParams) {
    this.profile = params.profile;
    this.env = params.env;
    this.runner = params.runner ?? defaultCommandRunner;
    this.query = params.query ?? createSshRemoteQuery(this.runner);
    this.probeFor = params.probeFor ?? ((host) => createRemoteArtifactProbe(this.runner, host));
    this.logger = params.logger ?? silentLogger;
    this.cwd = params.cwd ?? process.cwd();
  }

  private async localFile(label: string, input: string): Promise<StagedFile> {
    const resolved = await normalizeLocalPath(input, this.profile.localBaseDir, this.cwd);
    this.logger.debug(`${label} resolved`, { input, path: resolved.path, strategy: resolved.strategy });
    return { label, path: resolved.path };
  }

  private remoteCopyOf(file: StagedFile): string {
    return toPosixRemotePath(this.profile.remoteBaseDir, path.basename(file.path));
  }

  private queueUser(host: string): string | undefined {
    return userFromHost(host) ?? this.profile.clusterUser;
  }

  private async submit(host: string, script: StagedFile, exports: ExportVariableSet) {
    const remoteDir = this.profile.remoteBaseDir;
    const command = buildSubmitCommand({
      remoteDir,
      exports,
      script: path.basename(script.path),
    });
    this.logger.info("Submitting SLURM job", { host, remoteDir, exported: exports.names() });
    const result = await sshExec(this.runner, host, command);
    const submitOutput = (result.stdout || result.stderr).trim();
    return { remoteDir, jobId: parseSubmittedJobId(submitOutput), submitOutput };
  }

  async submitTraining(request: TrainingRequest): Promise<SubmitResult> {
    const host = request.clusterHost;
    const trainFile = await this.localFile("Training dataset", request.trainDataset);
    const valFile = await this.localFile("Validation dataset", request.valDataset);
    const configFile = await this.localFile("Config file", request.configFile);
    const script = await this.localFile("Training job script", this.profile.training.script);

    const apiKey = this.env.wandbApiKey;
    if (!apiKey) {
      throw new CredentialMissingError("WANDB_API_KEY", WANDB_KEY_REMEDIATION);
    }

    this.logger.info("Preparing training submission", {
      profile: this.profile.id,
      host,
      outputName: request.outputName,
      wandbProject: request.wandbProject.value,
      wandbProjectSource: request.wandbProject.source,
      wandbEntity: request.wandbEntity.value ?? "(personal account)",
      runName: request.runName.value,
      wandbApiKey: "present",
    });
    if (request.wandbEntity.value) {
      this.logger.warn(
        `Jobs log to wandb entity "${request.wandbEntity.value}"; a 403 from wandb means no access to it, leave the entity empty to use the personal account`,
      );
    }

    const exports = buildTrainingExports({
      configFile: this.remoteCopyOf(configFile),
      trainDataset: this.remoteCopyOf(trainFile),
      valDataset: this.remoteCopyOf(valFile),
      outputName: request.outputName,
      wandbProject: request.wandbProject.value,
      wandbEntity: request.wandbEntity.value,
      runName: request.runName.value,
      resumeFromCheckpoint: request.resumeFromCheckpoint.value
        ? resolveRemotePath(request.resumeFromCheckpoint.value, this.profile.remoteBaseDir)
        : undefined,
      wandbApiKey: apiKey,
    });

    await syncFiles({
      runner: this.runner,
      host,
      remoteDir: this.profile.remoteBaseDir,
      subdirs: ["logs", "output"],
      files: [trainFile, valFile, configFile, script],
    });

    const submitted = await this.submit(host, script, exports);
    this.logger.info("Training job submitted", { host, jobId: submitted.jobId });

    return {
      profile: this.profile.id,
      host,
      jobId: submitted.jobId,
      remoteDir: submitted.remoteDir,
      exported: exports.names(),
      submitOutput: submitted.submitOutput,
    };
  }

  async submitInference(request: InferenceRequest): Promise<SubmitResult> {
    const host = request.clusterHost;
    const inputFile = await this.localFile("Input file", request.inputFile);
    const configFile = await this.localFile("Config file", request.configFile);
    const script = await this.localFile("Inference job script", this.profile.inference.script);
    const files = [inputFile, configFile, script];

    await verifyLocalFiles(files);

    let adapter: AdapterLocation | undefined;
    if (request.checkpointPath) {
      const candidate = resolveRemotePath(request.checkpointPath, this.profile.remoteBaseDir);
      adapter = await locateAdapter(candidate, this.profile.remoteOutputDir, this.probeFor(host));
      this.logger.info("Adapter located", {
        requested: request.checkpointPath,
        path: adapter.path,
        strategy: adapter.strategy,
      });
    } else {
      this.logger.info("No adapter given, using the base model");
    }

    const exports = buildInferenceExports({
      configFile: this.remoteCopyOf(configFile),
      inputPath: this.remoteCopyOf(inputFile),
      outputName: request.outputName,
      checkpointPath: adapter?.path,
    });

    await syncFiles({
      runner: this.runner,
      host,
      remoteDir: this.profile.remoteBaseDir,
      subdirs: ["logs"],
      files,
    });

    const submitted = await this.submit(host, script, exports);
    this.logger.info("Inference job submitted", { host, jobId: submitted.jobId });

    return {
      profile: this.profile.id,
      host,
      jobId: submitted.jobId,
      remoteDir: submitted.remoteDir,
      exported: exports.names(),
      submitOutput: submitted.submitOutput,
      adapter,
    };
  }

  async kill(request: KillRequest): Promise<CancelOutcome> {
    const jobName = this.profile[request.jobKind].jobName;
    const outcome = await cancelJob({
      runner: this.runner,
      query: this.query,
      host: request.clusterHost,
      user: this.queueUser(request.clusterHost),
      jobName,
      jobId: request.jobId,
    });
    if (outcome.outcome === "not_found") {
      this.logger.info(`No running ${request.jobKind} jobs found`, { host: outcome.host, jobName });
    } else {
      this.logger.info("Job cancelled", { host: outcome.host, jobId: outcome.jobId });
    }
    return outcome;
  }

  async download(request: DownloadRequest): Promise<DownloadOutcome> {
    const outcome = await downloadOutput({
      runner: this.runner,
      query: this.query,
      host: request.clusterHost,
      remoteDataDir: this.profile.remoteDataDir,
      localDataDir: path.join(this.profile.localBaseDir, "data"),
      outputName: request.outputName,
      jobId: request.jobId,
    });
    if (outcome.outcome === "not_found") {
      this.logger.info("No output files found on cluster", {
        host: outcome.host,
        remoteDir: outcome.remoteDir,
        patterns: outcome.patterns,
      });
    } else {
      this.logger.info("Output downloaded", {
        remotePath: outcome.remotePath,
        localPath: outcome.localPath,
        jobId: outcome.jobId,
        sizeBytes: outcome.sizeBytes,
        lines: outcome.lines,
      });
    }
    return outcome;
  }
}
