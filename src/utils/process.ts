import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export async function runCommand(command: string, args: string[], options?: RunOptions): Promise<{ stdout: string; stderr: string; exitCode: number; }> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      signal: options?.signal,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024, // yt-dlp JSON dumps can be large
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const stdout = readOutput(err, "stdout");
    const stderr = readOutput(err, "stderr") || (err instanceof Error ? err.message : "");
    const exitCode = err instanceof Error && "code" in err && typeof err.code === "number" ? err.code : 1;
    throw new Error(`Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`, { cause: err });
  }
}

function readOutput(err: unknown, key: "stdout" | "stderr"): string {
  if (err instanceof Error && key in err) {
    const value: unknown = Reflect.get(err, key);
    return typeof value === "string" ? value : "";
  }
  return "";
}
