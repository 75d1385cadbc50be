import { execa } from "execa";

export type HelperRequest = {
  /** Rendered shell command line. */
  command: string;
  cwd: string;
  env: Record<string, string>;
  /** Aborted when the resolver gives up on the helper. */
  signal: AbortSignal;
};

export type HelperResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type HelperInvoker = (request: HelperRequest) => Promise<HelperResult>;

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ESRCH";
}

/** Runs the helper through `sh -c` in its own process group; aborting kills the whole group. */
export const execaInvoker: HelperInvoker = async request => {
  const subprocess = execa("sh", ["-c", request.command], {
    cwd: request.cwd,
    env: request.env,
    stdin: "ignore",
    reject: false,
    detached: true,
  });
  const killGroup = () => {
    if (subprocess.pid === undefined) return;
    try {
      process.kill(-subprocess.pid, "SIGKILL");
    } catch (error) {
      if (!isMissingProcess(error)) subprocess.kill("SIGKILL");
    }
  };
  if (request.signal.aborted) killGroup();
  request.signal.addEventListener("abort", killGroup, { once: true });

  try {
    const result = await subprocess;
    if (result.isTerminated) {
      throw new Error(`helper was stopped by ${result.signal ?? "a signal"}`);
    }
    if (result.failed && result.exitCode === undefined) {
      throw new Error(result.shortMessage ?? "helper could not be started", { cause: result.cause });
    }
    return { exitCode: result.exitCode ?? 1, stdout: result.stdout, stderr: result.stderr };
  } finally {
    request.signal.removeEventListener("abort", killGroup);
  }
};
