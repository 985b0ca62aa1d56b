import { execa, ExecaError } from "execa"

import { CommandNotFoundError, ExecError } from "./errors/index.js"

export interface RunOpts {
  /**
   * Directory the command runs in, defaults to the current directory.
   */
  cwd?: string

  /**
   * Capture stdout instead of forwarding it to the terminal.
   */
  captureOutput?: boolean
}

export interface CommandResult {
  /**
   * Captured stdout without its trailing newline, empty if not captured.
   */
  stdout: string
}

/**
 * CommandRunner is the only way the build reaches external tools.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  opts?: RunOpts,
) => Promise<CommandResult>

/**
 * execaRunner runs the command and waits for it. Tool output goes straight to
 * the terminal, so progress from cargo and friends stays visible.
 */
export const execaRunner: CommandRunner = async (file, args, opts = {}) => {
  try {
    const result = await execa(file, args, {
      cwd: opts.cwd,
      stdin: "ignore",
      stdout: opts.captureOutput ? "pipe" : "inherit",
      stderr: "inherit",
      reject: true,
    })

    return {
      stdout: typeof result.stdout === "string" ? result.stdout : "",
    }
  } catch (e) {
    if (!(e instanceof ExecaError)) {
      throw e
    }

    if ("code" in e && e.code === "ENOENT") {
      throw new CommandNotFoundError({ command: file, cause: e })
    }

    throw new ExecError(e.shortMessage, {
      cmd: [file, ...args],
      exitCode: e.exitCode ?? 1,
      cause: e,
    })
  }
}
