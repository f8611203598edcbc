import { spawn } from "child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
  timedOut: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => Promise<CommandResult>;

/**
 * Run a command and collect its output. Never rejects: spawn failures come back
 * as code 1 with the error message on stderr, a timeout kills the process.
 */
export const execCommand: CommandRunner = (command, args, timeoutMs) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      timeout: timeoutMs,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code, signal) => {
      const timedOut = code === null && signal !== null;
      finish({
        stdout,
        stderr: timedOut ? `${stderr}timed out after ${timeoutMs}ms` : stderr,
        code: code ?? 1,
        timedOut,
      });
    });

    proc.on("error", (error) => {
      finish({ stdout, stderr: error.message, code: 1, timedOut: false });
    });
  });
};
