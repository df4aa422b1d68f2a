import { spawn } from "node:child_process";

export interface CommandResult {
  /** False when the command could not be spawned or timed out */
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Timeout in milliseconds (default: 5 seconds) */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Run a command to completion and collect its output.
 * Never rejects; spawn failures and timeouts are reported in the result.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const finish = (result: CommandResult) => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    };

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, LC_ALL: "C" },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timeoutId = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, timeoutMs);

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("error", (err) => {
      clearTimeout(timeoutId);
      finish({
        ok: false,
        exitCode: -1,
        stdout,
        stderr,
        error: `Failed to spawn ${command}: ${err.message}`,
      });
    });

    proc.on("close", (code) => {
      clearTimeout(timeoutId);

      if (timedOut) {
        finish({
          ok: false,
          exitCode: code ?? -1,
          stdout,
          stderr,
          error: `${command} timed out after ${timeoutMs}ms`,
        });
        return;
      }

      finish({ ok: true, exitCode: code ?? -1, stdout, stderr });
    });
  });
}
