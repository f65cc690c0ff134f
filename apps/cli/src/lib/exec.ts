import { spawn } from "node:child_process";
import { ExternalToolError } from "./errors";
import type { Logger } from "./logger";

export type ToolRun = {
  command: string;
  args: string[];
  timeoutMs?: number;
  logger?: Logger;
};

export type ToolOutput = {
  stdout: string;
  stderr: string;
};

/**
 * Spawns `command` without a shell and resolves with its output once it exits with status 0.
 * Any other outcome (non-zero exit, signal, spawn error, timeout) rejects with
 * {@link ExternalToolError}.
 */
export async function runTool(run: ToolRun): Promise<ToolOutput> {
  const timeoutMs = run.timeoutMs ?? 0;
  run.logger?.debug(`spawn cmd=${run.command} ${run.args.join(" ")}`);

  return new Promise((resolve, reject) => {
    const proc = spawn(run.command, run.args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const settle = (finish: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      finish();
    };

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        proc.kill("SIGKILL");
        settle(() =>
          reject(
            new ExternalToolError({
              command: run.command,
              args: run.args,
              exitCode: null,
              stdout,
              stderr,
              reason: `timed out after ${timeoutMs}ms`,
            }),
          ),
        );
      }, timeoutMs);
    }

    proc.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });

    proc.on("error", (error) => {
      settle(() =>
        reject(
          new ExternalToolError({
            command: run.command,
            args: run.args,
            exitCode: null,
            stdout,
            stderr,
            reason: `could not be started: ${error.message}`,
          }),
        ),
      );
    });

    proc.on("close", (code, signal) => {
      settle(() => {
        if (code === 0) {
          resolve({ stdout, stderr });
          return;
        }
        reject(
          new ExternalToolError({
            command: run.command,
            args: run.args,
            exitCode: code,
            stdout,
            stderr,
            reason: code === null ? `was terminated by ${signal ?? "a signal"}` : undefined,
          }),
        );
      });
    });
  });
}
