/**
 * Filter bridge: runs a format pipe's command line and hands back its
 * output.
 *
 * The renderer only depends on the FilterBridge interface. The default
 * implementation runs the command through a shell with `spawnSync`, so a
 * render blocks for the lifetime of the command. There is no timeout: a
 * command that never exits hangs the render.
 *
 * Standard output is collected up to `maxBuffer` bytes (1 MiB by default).
 * A command that writes more is killed once the limit is passed, and what
 * it wrote so far is its output; the renderer keeps only the first
 * `capacity - 1` bytes of it anyway.
 */

import { spawnSync } from "node:child_process";
import type { Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class FilterSpawnError extends Error {
  constructor(
    public readonly command: string,
    cause?: unknown
  ) {
    super(`Unable to run filter command: ${command}`, { cause });
    this.name = "FilterSpawnError";
  }
}

export class FilterReadError extends Error {
  constructor(
    public readonly command: string,
    cause?: unknown
  ) {
    super(`Unable to read output of filter command: ${command}`, { cause });
    this.name = "FilterReadError";
  }
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/** A started filter command. */
export interface FilterHandle {
  /**
   * Complete standard output of the command.
   * @throws FilterReadError
   */
  read(): string;
  /** Exit status; -1 when the command was killed by a signal. */
  wait(): number;
}

export interface FilterBridge {
  /**
   * Start `commandLine`.
   * @throws FilterSpawnError
   */
  spawn(commandLine: string): FilterHandle;
}

// ---------------------------------------------------------------------------
// Shell quoting
// ---------------------------------------------------------------------------

/**
 * Quote a word for a POSIX shell.
 *
 * A single quote cannot be escaped inside single quotes, so the quoted span
 * is closed, a double-quoted `'` is inserted, and the span reopened.
 */
export function shellQuote(word: string): string {
  return `'${word.replace(/'/g, `'"'"'`)}'`;
}

// ---------------------------------------------------------------------------
// Shell implementation
// ---------------------------------------------------------------------------

export interface ShellFilterOptions {
  /** Shell that receives the command line as `-c` argument. */
  shell?: string;
  /** Largest output accepted from a command, in bytes. */
  maxBuffer?: number;
  logger?: Logger;
}

/** True when `spawnSync` stopped the command for passing `maxBuffer`. */
function isOutputOverflow(error: Error | undefined): boolean {
  return error !== undefined && "code" in error && error.code === "ENOBUFS";
}

/**
 * Filter bridge running commands through `shell -c`.
 */
export function createShellFilterBridge(options: ShellFilterOptions = {}): FilterBridge {
  const shell = options.shell ?? "/bin/sh";
  const maxBuffer = options.maxBuffer ?? 1024 * 1024;
  const logger = options.logger;

  return {
    spawn(commandLine: string): FilterHandle {
      const result = spawnSync(shell, ["-c", commandLine], {
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "pipe"],
        maxBuffer,
      });

      // pid 0: the shell itself could not be started
      if (result.error && !result.pid) {
        throw new FilterSpawnError(commandLine, result.error);
      }

      if (result.stderr) {
        logger?.debug("Filter command wrote to stderr", {
          command: commandLine,
          stderr: result.stderr.trimEnd(),
        });
      }

      // killed for writing too much: the output collected so far stands
      const overflowed = isOutputOverflow(result.error);
      if (overflowed) {
        logger?.debug("Filter output passed maxBuffer; command stopped", {
          command: commandLine,
          maxBuffer,
        });
      }

      return {
        read(): string {
          if (result.error && !overflowed) {
            throw new FilterReadError(commandLine, result.error);
          }
          return result.stdout ?? "";
        },
        wait(): number {
          if (overflowed) return 0;
          return result.status ?? -1;
        },
      };
    },
  };
}
