/**
 * Command runners — batch mode and the line console
 *
 * Both run strictly one round trip at a time: a command's reply is printed
 * before the next command is sent.
 */

import { createInterface } from "node:readline";
import { endsSession, routeInput } from "@rcon-console/commands";
import { formatResponse, type DisplayOptions } from "./format.js";

/** The part of a Connection the runners need */
export interface CommandExecutor {
  /** Resolves with the reply body exactly as the server sent it */
  execute(command: string): Promise<Buffer>;
}

/** Where output goes; process.stdout and process.stderr fit */
export interface TextSink {
  write(chunk: string | Uint8Array): unknown;
}

export interface RunnerOptions {
  display: DisplayOptions;
  stdout: TextSink;
  stderr: TextSink;
}

export interface BatchOptions extends RunnerOptions {
  /** Pause between commands in ms (never after the last) */
  waitMs: number;
  /** Override how the pause is awaited (tests) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run a fixed list of commands in order.
 *
 * @returns 0 on success, 1 if a command failed (the rest are skipped)
 */
export async function runBatch(
  executor: CommandExecutor,
  commands: readonly string[],
  options: BatchOptions,
): Promise<number> {
  const sleep = options.sleep ?? delay;

  for (let i = 0; i < commands.length; i++) {
    const command = commands[i] ?? "";
    try {
      const body = await executor.execute(command);
      writeResponse(options, body);
    } catch (err) {
      options.stderr.write(`Command failed: ${errorMessage(err)}\n`);
      return 1;
    }

    // The server is not reliable after "stop"; nothing more is sent
    if (endsSession(command)) break;

    if (i < commands.length - 1 && options.waitMs > 0) {
      await sleep(options.waitMs);
    }
  }

  return 0;
}

/**
 * Read commands one per line until EOF, "q", or "stop".
 * A failed command is reported and the loop goes on.
 *
 * @returns 0 normally, 1 if reading the input failed
 */
export async function runLineConsole(
  executor: CommandExecutor,
  input: NodeJS.ReadableStream,
  options: RunnerOptions,
): Promise<number> {
  const { stdout, stderr } = options;
  stdout.write("Logged in.\nType 'Q' or press Ctrl-D / Ctrl-C to disconnect.\n");

  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  try {
    stdout.write("> ");
    for await (const line of rl) {
      const route = routeInput(line);
      if (route.kind === "quit") break;

      if (route.kind === "command") {
        try {
          const body = await executor.execute(route.command);
          writeResponse(options, body);
        } catch (err) {
          stderr.write(`Error: ${errorMessage(err)}\n`);
        }
        if (route.endsSession) break;
      }

      stdout.write("> ");
    }
  } catch (err) {
    stderr.write(`Input error: ${errorMessage(err)}\n`);
    return 1;
  } finally {
    rl.close();
  }

  return 0;
}

function writeResponse(options: RunnerOptions, body: Buffer): void {
  const output = formatResponse(body, options.display);
  if (output.length > 0) options.stdout.write(output);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
