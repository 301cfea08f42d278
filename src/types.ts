export type OperationKind = "submit-training" | "submit-inference" | "kill" | "download";

export type JobKind = "training" | "inference";

export type TrainingDefaults = {
  script: string;
  jobName: string;
  trainDataset: string;
  valDataset: string;
  configFile: string;
  outputName: string;
  wandbProject: string;
};

export type InferenceDefaults = {
  script: string;
  jobName: string;
  inputFile: string;
  configFile: string;
  outputName: string;
};

export type LabProfile = {
  id: string;
  clusterHost: string;
  clusterUser?: string;
  remoteBaseDir: string;
  remoteDataDir: string;
  remoteOutputDir: string;
  localBaseDir: string;
  training: TrainingDefaults;
  inference: InferenceDefaults;
};

export type LabConfig = {
  defaultProfile?: string;
  profiles: Record<string, LabProfile>;
};

export type EnvSnapshot = Readonly<{
  wandbApiKey?: string;
  wandbProject?: string;
  wandbEntity?: string;
  runName?: string;
  resumeFromCheckpoint?: string;
  logLevel?: string;
}>;

export type PositionalSlot = { kind: "absent" } | { kind: "given"; value: string };

export type ValueSource = "argument" | "environment" | "default";

export type Resolved<T> = Readonly<{
  value: T;
  source: ValueSource;
}>;

export type AdapterHostArgument =
  | { kind: "none"; host?: string }
  | { kind: "host-only"; host: string }
  | { kind: "checkpoint-then-host"; checkpointPath: string; host?: string };

export type TrainingRequest = Readonly<{
  kind: "submit-training";
  trainDataset: string;
  valDataset: string;
  configFile: string;
  outputName: string;
  clusterHost: string;
  wandbProject: Resolved<string>;
  wandbEntity: Resolved<string | undefined>;
  runName: Resolved<string | undefined>;
  resumeFromCheckpoint: Resolved<string | undefined>;
}>;

export type InferenceRequest = Readonly<{
  kind: "submit-inference";
  inputFile: string;
  configFile: string;
  outputName: string;
  checkpointPath?: string;
  clusterHost: string;
}>;

export type KillRequest = Readonly<{
  kind: "kill";
  jobKind: JobKind;
  jobId?: string;
  clusterHost: string;
}>;

export type DownloadRequest = Readonly<{
  kind: "download";
  jobId?: string;
  outputName: string;
  clusterHost: string;
}>;

export type OperationRequest = TrainingRequest | InferenceRequest | KillRequest | DownloadRequest;

export type PathStrategy = "absolute" | "local-base" | "parent-relative-cwd";

export type ResolvedPath = Readonly<{
  path: string;
  strategy: PathStrategy;
}>;

export type AdapterStrategy =
  | "direct"
  | "checkpoint-subdir"
  | "output-root-direct"
  | "output-root-checkpoint-subdir";

export type AdapterLocation = Readonly<{
  path: string;
  strategy: AdapterStrategy;
}>;

export type RemoteJob = {
  jobId: string;
  name: string;
  submitTime?: string;
};

export type RemoteFile = {
  path: string;
  modifiedAt: number;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number },
) => Promise<CommandResult>;
