import { spawn } from "node:child_process";
import { CommandError } from "./errors.js";
import type { CommandResult, CommandRunner } from "./types.js";

/**
 * Spawns a local process and collects its output. ssh, rsync and scp are the only
 * commands this tool runs, so timeouts are left to their own options unless a
 * caller passes `timeoutMs`.
 */
export const defaultCommandRunner: CommandRunner = async (command, args, options = {}) => {
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
      timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
      killSignal: "SIGTERM",
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", reject);
    child.once("close", (code, signal) => {
      const errText = Buffer.concat(stderr).toString("utf8");
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: signal && code == null ? `${errText}terminated by ${signal}` : errText,
      });
    });
  });
};

export function describeFailure(result: CommandResult): string {
  const stderr = result.stderr.trim();
  const stdout = result.stdout.trim();
  return stderr || stdout || `exit code ${result.code}`;
}

export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number },
): Promise<CommandResult> {
  const result = await runner(command, args, options);
  if (result.code !== 0) {
    throw new CommandError(command, result.code, describeFailure(result));
  }
  return result;
}
