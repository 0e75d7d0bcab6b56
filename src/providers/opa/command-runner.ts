import { execFile } from "node:child_process";
import { isNodeError } from "../../errors/errors.js";

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandOptions {
  /** Written to the child's stdin, which is then closed. */
  readonly input: string;
  readonly signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Runs a binary without a shell. A non-zero exit resolves with its code;
 * spawn failures and aborts reject.
 */
export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      command,
      [...args],
      { signal: options.signal, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (error && typeof error.code !== "number") {
          reject(error);
          return;
        }
        resolve({
          exitCode: error && typeof error.code === "number" ? error.code : 0,
          stdout,
          stderr,
        });
      },
    );
    // opa may exit before reading its input; the exit status reports that.
    child.stdin?.on("error", (error) => {
      if (!isNodeError(error, "EPIPE")) {
        reject(error);
      }
    });
    child.stdin?.end(options.input);
  });
