import { spawn } from "node:child_process";
import type { Command } from "./types";

export type RunOptions = {
  /** Written to the child's stdin, which is then closed */
  input?: string;
  timeoutMs: number;
};

export type CommandRunner = (command: Command, options: RunOptions) => Promise<string>;

/**
 * Run a clipboard utility and resolve with its stdout. Rejects on spawn
 * failure, non-zero exit or timeout (the child is killed).
 */
export const runCommand: CommandRunner = (command, options) =>
  new Promise<string>((resolve, reject) => {
    const child = spawn(command.cmd, command.args, { windowsHide: true });
    let stdout = "";
    let stderr = "";
    let settled = false;

    const timer = setTimeout(() => {
      child.kill();
      fail(new Error(`'${command.cmd}' timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    function fail(err: Error) {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    }

    function succeed(out: string) {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(out);
    }

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => (stdout += chunk));
    child.stderr.on("data", (chunk: Buffer) => (stderr += chunk.toString()));
    child.on("error", fail);
    child.on("close", (code) => {
      if (code === 0) return succeed(stdout);
      const errorMsg = stderr.trim();
      fail(new Error(`'${command.cmd}' exited with code ${code}${errorMsg ? `: ${errorMsg}` : ""}`));
    });
    child.stdin.on("error", fail);
    if (options.input !== undefined) child.stdin.write(options.input);
    child.stdin.end();
  });
