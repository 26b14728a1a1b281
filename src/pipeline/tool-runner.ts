import { spawn } from "node:child_process";
import { ExternalToolError } from "../errors/index.js";
import type { ToolInvocation, ToolRunner } from "./types.js";

const STDERR_TAIL_CHARS = 4096;

/**
 * Runs a stage script with `sh -e -c`. The child gets `invocation.env`
 * verbatim, so nothing from this process leaks in.
 */
export class ShellToolRunner implements ToolRunner {
  constructor(private readonly shell: string = "/bin/sh") {}

  run(invocation: ToolInvocation): Promise<void> {
    const command = `${invocation.stage} script`;
    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.shell, ["-e", "-c", invocation.script], {
        cwd: invocation.cwd,
        env: { ...invocation.env },
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stderrTail = "";
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      child.stdout.on("data", (chunk: string) => {
        invocation.onOutput?.("stdout", chunk);
      });

      child.stderr.on("data", (chunk: string) => {
        stderrTail = (stderrTail + chunk).slice(-STDERR_TAIL_CHARS);
        invocation.onOutput?.("stderr", chunk);
      });

      child.once("error", (error) => {
        reject(
          new ExternalToolError({
            stage: invocation.stage,
            command,
            exitCode: null,
            signal: null,
            stderr: error.message,
            cause: error,
          }),
        );
      });

      child.once("close", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(
          new ExternalToolError({
            stage: invocation.stage,
            command,
            exitCode: code,
            signal,
            stderr: stderrTail.trim(),
          }),
        );
      });
    });
  }
}
