import type { EnvSnapshot } from "./types.js";

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value != null && value.length > 0 ? value : undefined;
}

/**
 * Captures the variables this tool reads, once, at start-up. Empty values count as
 * unset. Credentials are kept verbatim (no trimming).
 */
export function readEnvSnapshot(env: NodeJS.ProcessEnv = process.env): EnvSnapshot {
  return Object.freeze({
    wandbApiKey: readVar(env, "WANDB_API_KEY"),
    wandbProject: readVar(env, "WANDB_PROJECT"),
    wandbEntity: readVar(env, "WANDB_ENTITY"),
    runName: readVar(env, "RUN_NAME"),
    resumeFromCheckpoint: readVar(env, "RESUME_FROM_CHECKPOINT"),
    logLevel: readVar(env, "LOG_LEVEL"),
  });
}
