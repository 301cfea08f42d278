export {
  parseAdapterHostArgument,
  resolveDownloadArgs,
  resolveInferenceArgs,
  resolveKillArgs,
  resolveOverride,
  resolveTrainingArgs,
  slotAt,
} from "./src/args.js";
export { compareVersions, latestCheckpointDir, locateAdapter } from "./src/checkpoint.js";
export { LabConfigSchema, loadLabConfig, parseLabConfig, selectProfile } from "./src/config.js";
export { readEnvSnapshot } from "./src/env.js";
export * from "./src/errors.js";
export { defaultCommandRunner } from "./src/exec.js";
export { cancelJob, downloadOutput, outputFilename, parseJobIdFromFilename } from "./src/lifecycle.js";
export type { CancelOutcome, DownloadOutcome } from "./src/lifecycle.js";
export { createLogger, silentLogger } from "./src/logger.js";
export type { Logger } from "./src/logger.js";
export { normalizeLocalPath, resolveRemotePath } from "./src/paths.js";
export { createRemoteArtifactProbe, localArtifactProbe } from "./src/probe.js";
export type { ArtifactProbe } from "./src/probe.js";
export { compareFilesNewestFirst, compareJobsNewestFirst, createSshRemoteQuery } from "./src/remote.js";
export type { RemoteQuery } from "./src/remote.js";
export { LabService } from "./src/service.js";
export type { LabServiceParams, SubmitResult } from "./src/service.js";
export {
  buildInferenceExports,
  buildSubmitCommand,
  buildTrainingExports,
  ExportVariableSet,
} from "./src/submit.js";
export { syncFiles, verifyLocalFiles } from "./src/sync.js";
export type * from "./src/types.js";
