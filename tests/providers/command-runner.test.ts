import { Writable } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";

type ExecCallback = (
  error: (Error & { code?: number | string }) | null,
  stdout: string,
  stderr: string,
) => void;

const mocks = vi.hoisted(() => ({
  stdinError: "EPIPE",
  exit: { code: 1, stderr: "" },
}));

vi.mock("node:child_process", () => ({
  execFile: (_command: string, _args: string[], _options: object, callback: ExecCallback) => {
    const stdin = new Writable({
      write(_chunk, _encoding, done) {
        done(Object.assign(new Error(`write ${mocks.stdinError}`), { code: mocks.stdinError }));
      },
    });
    setImmediate(() => {
      const error =
        mocks.exit.code === 0
          ? null
          : Object.assign(new Error("Command failed"), { code: mocks.exit.code });
      callback(error, "", mocks.exit.stderr);
    });
    return { stdin };
  },
}));

const { execFileRunner } = await import("../../src/providers/opa/command-runner.js");

afterEach(() => {
  mocks.stdinError = "EPIPE";
  mocks.exit = { code: 1, stderr: "" };
});

describe("execFileRunner", () => {
  it("reports the exit status when the command closes stdin early", async () => {
    mocks.exit = { code: 1, stderr: "unknown flag" };

    await expect(execFileRunner("opa", ["eval"], { input: "{}" })).resolves.toEqual({
      exitCode: 1,
      stdout: "",
      stderr: "unknown flag",
    });
  });

  it("rejects on other stdin errors", async () => {
    mocks.stdinError = "EIO";

    await expect(execFileRunner("opa", ["eval"], { input: "{}" })).rejects.toThrow("write EIO");
  });
});
