import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import type { ToolDefinition } from "../ToolTypes.js";
import { optionalStringArg, stringArg } from "../ToolArgs.js";

export interface CodeInterpreter {
  command: string;
  /** Arguments placed before the code, e.g. ["-e"] for node or ["-c"] for python3. */
  args: string[];
}

export interface CodeExecutionOptions {
  interpreters: Record<string, CodeInterpreter>;
  timeoutMs: number;
  maxOutputBytes?: number;
}

interface RunOptions {
  cwd: string;
  timeoutMs: number;
  maxOutputBytes: number;
  signal?: AbortSignal;
}

interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

// Resolves on any exit code; rejects when the child was killed or never started.
const runInterpreter = (command: string, args: string[], options: RunOptions): Promise<RunResult> =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        encoding: "utf8",
        timeout: options.timeoutMs,
        maxBuffer: options.maxOutputBytes,
        signal: options.signal,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }
        if (error.signal) {
          reject(new Error(`Code execution stopped by ${error.signal}`));
          return;
        }
        reject(error);
      },
    );
  });

export const createCodeExecutionTool = (options: CodeExecutionOptions): ToolDefinition => {
  const languages = Object.keys(options.interpreters);
  const defaultLanguage = languages[0];
  return {
    name: "run_code",
    description:
      "Execute a code snippet in the workspace folder and return its output. Print values you want to see.",
    category: "code",
    inputSchema: {
      type: "object",
      required: ["code"],
      properties: {
        code: { type: "string" },
        language: { type: "string", enum: languages },
      },
    },
    handler: async (args, context) => {
      const code = stringArg(args, "code");
      const language = optionalStringArg(args, "language") ?? defaultLanguage;
      const interpreter = language ? options.interpreters[language] : undefined;
      if (!interpreter) {
        throw new Error(`Language not allowed: ${language ?? "none configured"}`);
      }
      await fs.mkdir(context.workspaceRoot, { recursive: true });

      const { stdout, stderr, exitCode } = await runInterpreter(interpreter.command, [...interpreter.args, code], {
        cwd: context.workspaceRoot,
        timeoutMs: options.timeoutMs,
        maxOutputBytes: options.maxOutputBytes ?? 1024 * 1024,
        signal: context.signal,
      });
      if (exitCode !== 0) {
        const message = stderr || stdout || `Code exited with code ${exitCode}`;
        throw new Error(message);
      }

      return {
        output: stdout || stderr,
        data: {
          language,
          stdout,
          stderr,
          exitCode,
        },
      };
    },
  };
};
