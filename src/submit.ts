import { CommandError, UsageError } from "./errors.js";
import { shellQuote } from "./shell.js";

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Ordered variables for `sbatch --export`. Optional entries are skipped when unset
 * so the job script applies its own default instead of receiving `KEY=`.
 */
export class ExportVariableSet {
  private readonly entries: Array<[string, string]> = [];

  set(name: string, value: string): this {
    if (!VARIABLE_NAME.test(name)) {
      throw new UsageError(`Invalid environment variable name: ${name}`);
    }
    if (value.includes(",")) {
      throw new UsageError(`${name} cannot contain "," (sbatch --export separator)`);
    }
    const existing = this.entries.findIndex(([key]) => key === name);
    if (existing >= 0) {
      this.entries[existing] = [name, value];
    } else {
      this.entries.push([name, value]);
    }
    return this;
  }

  setOptional(name: string, value: string | undefined): this {
    if (value !== undefined && value.length > 0) {
      this.set(name, value);
    }
    return this;
  }

  has(name: string): boolean {
    return this.entries.some(([key]) => key === name);
  }

  names(): string[] {
    return this.entries.map(([key]) => key);
  }

  toString(): string {
    return this.entries.map(([key, value]) => `${key}=${value}`).join(",");
  }
}

export type TrainingExportParams = {
  configFile: string;
  trainDataset: string;
  valDataset: string;
  outputName: string;
  wandbProject: string;
  wandbEntity?: string;
  runName?: string;
  resumeFromCheckpoint?: string;
  wandbApiKey?: string;
};

export function buildTrainingExports(params: TrainingExportParams): ExportVariableSet {
  return new ExportVariableSet()
    .set("CONFIG_FILE", params.configFile)
    .set("TRAIN_DATASET", params.trainDataset)
    .set("VAL_DATASET", params.valDataset)
    .set("OUTPUT_NAME", params.outputName)
    .set("WANDB_PROJECT", params.wandbProject)
    .setOptional("WANDB_ENTITY", params.wandbEntity)
    .setOptional("RUN_NAME", params.runName)
    .setOptional("RESUME_FROM_CHECKPOINT", params.resumeFromCheckpoint)
    .setOptional("WANDB_API_KEY", params.wandbApiKey);
}

export type InferenceExportParams = {
  configFile: string;
  inputPath: string;
  outputName: string;
  checkpointPath?: string;
};

export function buildInferenceExports(params: InferenceExportParams): ExportVariableSet {
  return new ExportVariableSet()
    .set("CONFIG_FILE", params.configFile)
    .set("INPUT_PATH", params.inputPath)
    .set("OUTPUT_NAME", params.outputName)
    .setOptional("CHECKPOINT_PATH", params.checkpointPath);
}

export function buildSubmitCommand(params: {
  remoteDir: string;
  exports: ExportVariableSet;
  script: string;
}): string {
  return [
    `cd ${shellQuote(params.remoteDir)}`,
    `sbatch --export=${shellQuote(params.exports.toString())} ${shellQuote(params.script)}`,
  ].join(" && ");
}

export function parseSubmittedJobId(stdout: string): string {
  const text = stdout.trim();
  const strict = /Submitted\s+batch\s+job\s+(\d+)/i.exec(text);
  if (strict?.[1]) {
    return strict[1];
  }
  const loose = /\bjob\s+(\d+)\b/i.exec(text);
  if (loose?.[1]) {
    return loose[1];
  }
  throw new CommandError(
    "sbatch",
    0,
    `Unable to parse job id from sbatch output: ${text || "<empty>"}`,
  );
}
