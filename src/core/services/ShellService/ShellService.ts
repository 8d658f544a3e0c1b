/**
 * ShellService - wraps process execution for testability.
 */

import { spawn } from "node:child_process";
import { Context, Data, Effect, Layer } from "effect";

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string;
  readonly command: string;
}> {}

export interface ShellResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface ShellService {
  /** Run `command` with `args` (no shell), wait for it to exit */
  readonly run: (command: string, args: ReadonlyArray<string>) => Effect.Effect<ShellResult, ShellError>;
}

export class ShellServiceTag extends Context.Tag("ShellService")<ShellServiceTag, ShellService>() {}

export const renderCommand = (command: string, args: ReadonlyArray<string>): string =>
  [command, ...args].map((part) => (/[\s"'$`\\]/.test(part) ? JSON.stringify(part) : part)).join(" ");

export const ShellServiceLive = Layer.succeed(ShellServiceTag, {
  run: (command, args) =>
    Effect.async<ShellResult, ShellError>((resume) => {
      const rendered = renderCommand(command, args);
      let stdout = "";
      let stderr = "";
      let settled = false;

      const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (error) => {
        if (settled) return;
        settled = true;
        resume(Effect.fail(new ShellError({ message: `Shell command failed: ${error.message}`, command: rendered })));
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        resume(
          Effect.succeed({
            stdout,
            stderr: signal !== null ? `${stderr}terminated by ${signal}` : stderr,
            exitCode: code ?? -1
          })
        );
      });
    })
});
