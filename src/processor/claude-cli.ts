import { spawn } from "node:child_process";
import type pino from "pino";
import { GenerationError } from "../errors.js";
import type { TextCompleter } from "./index.js";

export interface ClaudeCliOptions {
  model: string;
  timeoutMs: number;
  /** Executable name or path. */
  command?: string;
}

export function createClaudeCliCompleter(options: ClaudeCliOptions, logger: pino.Logger): TextCompleter {
  const command = options.command ?? "claude";

  return {
    name: "claude-cli",
    model: options.model,
    complete(system: string, user: string): Promise<string> {
      logger.debug({ model: options.model, inputLength: user.length }, "Sending to Claude CLI");
      return spawnClaude(command, ["-p", system, "--model", options.model], user, options.timeoutMs, logger);
    },
  };
}

function spawnClaude(
  command: string,
  args: string[],
  input: string,
  timeoutMs: number,
  logger: pino.Logger,
): Promise<string> {
  return new Promise((resolve, reject) => {
    // Strip CLAUDECODE so the CLI can run from inside another Claude session
    const env = { ...process.env };
    delete env["CLAUDECODE"];

    const child = spawn(command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      timeout: timeoutMs,
      env,
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("close", (code, signal) => {
      if (code !== 0) {
        logger.warn({ code, signal, stderr: stderr.slice(0, 500) }, "Claude CLI exited with error");
        const reason = signal ? `timed out or was killed (${signal})` : `exited with code ${code}`;
        reject(new GenerationError(`Claude CLI ${reason}: ${stderr.slice(0, 200)}`));
        return;
      }
      resolve(stdout);
    });

    child.on("error", (err) => {
      reject(new GenerationError(`Claude CLI spawn error: ${err.message}`, undefined, { cause: err }));
    });

    child.stdin.write(input);
    child.stdin.end();
  });
}
