import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number }
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    const stderr =
      err instanceof Error && "stderr" in err && typeof err.stderr === "string"
        ? err.stderr
        : String(err);
    const exitCode =
      err instanceof Error && "code" in err && typeof err.code === "number"
        ? err.code
        : 1;
    throw new Error(
      `Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}`,
      { cause: err }
    );
  }
};
