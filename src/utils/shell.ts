import { execFile } from "node:child_process";

export interface ShellResult {
  stdout: string;
  stderr: string;
  success: boolean;
  exitCode: number;
}

export interface ExecOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/** Runs a program without a shell. Never rejects; failures are reported in the result. */
export function exec(file: string, args: readonly string[], opts: ExecOptions = {}): Promise<ShellResult> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      {
        timeout: opts.timeoutMs ?? 30_000,
        encoding: "utf-8",
        maxBuffer: 64 * 1024 * 1024,
        env: opts.env ?? process.env,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, success: true, exitCode: 0 });
          return;
        }
        // code is the exit status for a finished process, or an errno string when spawning failed.
        const exitCode = typeof err.code === "number" ? err.code : 127;
        resolve({ stdout, stderr: stderr || err.message, success: false, exitCode });
      },
    );
  });
}
