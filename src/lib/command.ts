/**
 * Subprocess execution with captured output
 */

import { spawn } from "child_process";

import { VitalsError } from "./errors.js";
import { ok, err } from "./result.js";

import type { Result } from "./result.js";

/** Max stdout/stderr capture per stream in bytes */
const MAX_OUTPUT_SIZE = 10 * 1024 * 1024;

export interface CommandOutput {
  stdout: string;
  stderr: string;
  /** Process exit code; 1 when the process was killed by a signal or timeout */
  exitCode: number;
  timedOut: boolean;
}

/**
 * The process could not be started at all (binary missing, not executable)
 */
export class CommandSpawnError extends VitalsError {
  constructor(command: string, cause: string) {
    super(`Failed to start '${command}': ${cause}`, "COMMAND_SPAWN_FAILED", { command, cause });
    this.name = "CommandSpawnError";
  }
}

/**
 * Run a command to completion and capture its output.
 *
 * Never rejects: a process that starts always yields `ok`, whatever its
 * exit status; only a spawn failure yields `err`.
 */
export function runCommand(
  cmd: string,
  args: string[],
  cwd: string,
  timeoutMs: number = 30000
): Promise<Result<CommandOutput, CommandSpawnError>> {
  return new Promise((resolve) => {
    const commandLine = [cmd, ...args].join(" ");
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const settle = (result: Result<CommandOutput, CommandSpawnError>): void => {
      if (!settled) {
        settled = true;
        clearTimeout(timer);
        resolve(result);
      }
    };

    const child = spawn(cmd, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      if (stdout.length < MAX_OUTPUT_SIZE) stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      if (stderr.length < MAX_OUTPUT_SIZE) stderr += chunk;
    });

    child.on("error", (error) => {
      settle(err(new CommandSpawnError(commandLine, error.message)));
    });

    child.on("close", (code) => {
      settle(ok({ stdout, stderr, exitCode: code ?? 1, timedOut }));
    });
  });
}
