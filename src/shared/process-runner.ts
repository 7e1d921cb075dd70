/**
 * Process Runner - one failure-translation path for every external command
 * (git, bash configure, bazel, pkg-config)
 */

import { spawn } from "node:child_process";
import { SubprocessFailedError } from "../core/provision/errors.js";
import { getLogger } from "./pino-logger.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("process-runner");
}

/**
 * Fluent description of a command: program, arguments, working directory
 * and extra environment
 */
export class CommandSpec {
  private readonly argv: string[] = [];
  private readonly extraEnv: Record<string, string> = {};
  private workingDir: string | undefined;

  constructor(public readonly program: string) {}

  arg(value: string): this {
    this.argv.push(value);
    return this;
  }

  args(values: Iterable<string>): this {
    for (const value of values) {
      this.argv.push(value);
    }
    return this;
  }

  cwd(dir: string): this {
    this.workingDir = dir;
    return this;
  }

  env(key: string, value: string): this {
    this.extraEnv[key] = value;
    return this;
  }

  getArgs(): readonly string[] {
    return this.argv;
  }

  getCwd(): string | undefined {
    return this.workingDir;
  }

  getEnv(): Readonly<Record<string, string>> {
    return this.extraEnv;
  }

  /**
   * Exact command line for diagnostics, e.g.
   * `cd "/src" && TF_NEED_CUDA="0" "bash" "-c" "yes ''|./configure"`
   */
  toString(): string {
    const parts: string[] = [];
    if (this.workingDir) {
      parts.push(`cd ${JSON.stringify(this.workingDir)} &&`);
    }
    for (const [key, value] of Object.entries(this.extraEnv)) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    }
    parts.push(JSON.stringify(this.program));
    for (const value of this.argv) {
      parts.push(JSON.stringify(value));
    }
    return parts.join(" ");
  }
}

export type CommandConfigurator = (command: CommandSpec) => CommandSpec;

export interface ProcessRunner {
  /** Run with inherited stdio; non-zero exit is a SubprocessFailedError */
  run(program: string, configure?: CommandConfigurator): Promise<void>;
  /** Run and return captured stdout; stderr stays inherited */
  output(program: string, configure?: CommandConfigurator): Promise<string>;
}

export function buildCommand(program: string, configure?: CommandConfigurator): CommandSpec {
  const command = new CommandSpec(program);
  return configure ? configure(command) : command;
}

export class NodeProcessRunner implements ProcessRunner {
  async run(program: string, configure?: CommandConfigurator): Promise<void> {
    await this.execute(buildCommand(program, configure), false);
  }

  async output(program: string, configure?: CommandConfigurator): Promise<string> {
    return await this.execute(buildCommand(program, configure), true);
  }

  private execute(command: CommandSpec, capture: boolean): Promise<string> {
    const commandLine = command.toString();
    ensureLogger().info({ command: commandLine }, "Executing command");

    return new Promise<string>((resolve, reject) => {
      const child = spawn(command.program, [...command.getArgs()], {
        cwd: command.getCwd(),
        env: { ...process.env, ...command.getEnv() },
        stdio: ["ignore", capture ? "pipe" : "inherit", "inherit"],
      });

      const chunks: Buffer[] = [];
      child.stdout?.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      child.once("error", (error) => {
        reject(new SubprocessFailedError(commandLine, null, error));
      });

      child.once("close", (code, signal) => {
        if (code === 0) {
          ensureLogger().info({ command: commandLine }, "Command finished successfully");
          resolve(Buffer.concat(chunks).toString("utf8"));
          return;
        }
        const cause = signal ? new Error(`terminated by ${signal}`) : undefined;
        reject(new SubprocessFailedError(commandLine, code, cause));
      });
    });
  }
}
