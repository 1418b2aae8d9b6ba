import { spawn } from "child_process";

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  cwd: string;
  env?: Record<string, string | undefined>;
  timeoutMs: number;
  signal?: AbortSignal;
  // Strings replaced by *** in logged arguments and in error messages.
  redact?: string[];
}

export function redactArgs(args: string[], secrets: string[] = []): string[] {
  return args.map((arg) =>
    secrets.reduce((acc, secret) => (secret ? acc.split(secret).join("***") : acc), arg)
  );
}

export async function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions
): Promise<ProcessResult> {
  options.signal?.throwIfAborted();

  return new Promise((resolve, reject) => {
    console.log(`[process] Spawning: ${command} ${redactArgs(args, options.redact).join(" ")}`);

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    // Close stdin immediately so git never waits on a credential prompt.
    proc.stdin?.end();

    let stdout = "";
    let stderr = "";
    let settled = false;

    const cleanup = () => {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    };

    const settleReject = (error: Error) => {
      if (settled) return;
      settled = true;
      cleanup();
      error.message = redactArgs([error.message], options.redact)[0];
      console.log(`[process] ${command} FAILED: ${error.message}`);
      reject(error);
    };

    const settleResolve = (code: number) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve({ code, stdout, stderr });
    };

    const onAbort = () => {
      proc.kill("SIGTERM");
      settleReject(new Error(`Process ${command} aborted`));
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    proc.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = setTimeout(() => {
      proc.kill("SIGTERM");
      settleReject(new Error(`Process ${command} timed out after ${Math.round(options.timeoutMs / 1000)}s`));
    }, options.timeoutMs);

    proc.on("close", (code) => {
      const exitCode = code ?? -1;
      if (exitCode !== 0) {
        settleReject(new Error(`Process ${command} exited with code ${exitCode}. ${stderr.trim()}`));
        return;
      }
      settleResolve(exitCode);
    });

    proc.on("error", (err) => {
      settleReject(err);
    });
  });
}
