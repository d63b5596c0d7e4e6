/**
 * Runner tests — batch mode and the line console, with a scripted executor.
 */

import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import { runBatch, runLineConsole, type CommandExecutor, type TextSink } from "../src/runner.js";
import type { DisplayOptions } from "../src/format.js";

// =============================================================================
// Helpers
// =============================================================================

class ScriptedExecutor implements CommandExecutor {
  readonly calls: string[] = [];

  constructor(
    private readonly replies: Record<string, string | Error> = {},
    private readonly log: string[] = [],
  ) {}

  async execute(command: string): Promise<Buffer> {
    this.calls.push(command);
    this.log.push(`exec ${command}`);
    const reply = this.replies[command] ?? "";
    if (reply instanceof Error) throw reply;
    return Buffer.from(reply, "utf-8");
  }
}

class Capture implements TextSink {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
    return true;
  }

  get bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  get text(): string {
    return this.bytes.toString("utf-8");
  }
}

const raw: DisplayOptions = { silent: false, colors: "raw" };
const BANNER = "Logged in.\nType 'Q' or press Ctrl-D / Ctrl-C to disconnect.\n";

function io(display: DisplayOptions = raw) {
  return { display, stdout: new Capture(), stderr: new Capture() };
}

// =============================================================================
// Batch
// =============================================================================

describe("runBatch", () => {
  it("waits between commands but not after the last", async () => {
    const log: string[] = [];
    const executor = new ScriptedExecutor({}, log);
    const options = io();

    const code = await runBatch(executor, ["say hello", "save-all", "list"], {
      ...options,
      waitMs: 2000,
      sleep: async (ms) => {
        log.push(`sleep ${ms}`);
      },
    });

    expect(code).toBe(0);
    expect(log).toEqual(["exec say hello", "sleep 2000", "exec save-all", "sleep 2000", "exec list"]);
  });

  it("stops after a stop command", async () => {
    const log: string[] = [];
    const executor = new ScriptedExecutor({}, log);

    const code = await runBatch(executor, ["list", "stop", "say after"], {
      ...io(),
      waitMs: 1000,
      sleep: async (ms) => {
        log.push(`sleep ${ms}`);
      },
    });

    expect(code).toBe(0);
    expect(log).toEqual(["exec list", "sleep 1000", "exec stop"]);
  });

  it("never sleeps without a wait", async () => {
    const slept: number[] = [];

    await runBatch(new ScriptedExecutor(), ["a", "b"], {
      ...io(),
      waitMs: 0,
      sleep: async (ms) => {
        slept.push(ms);
      },
    });

    expect(slept).toEqual([]);
  });

  it("prints formatted replies", async () => {
    const options = io({ silent: false, colors: "strip" });
    const executor = new ScriptedExecutor({ list: "§aThere are 0 players", "save-all": "" });

    await runBatch(executor, ["list", "save-all"], { ...options, waitMs: 0 });

    expect(options.stdout.text).toBe("There are 0 players\n");
  });

  it("writes raw replies byte for byte", async () => {
    const options = io();
    const executor: CommandExecutor = { execute: async () => Buffer.from([0xff, 0x41, 0xa7, 0x63]) };

    await runBatch(executor, ["list"], { ...options, waitMs: 0 });

    expect(options.stdout.bytes).toEqual(Buffer.from([0xff, 0x41, 0xa7, 0x63]));
  });

  it("prints nothing in silent mode", async () => {
    const options = io({ silent: true, colors: "ansi" });

    await runBatch(new ScriptedExecutor({ list: "There are 0 players" }), ["list"], { ...options, waitMs: 0 });

    expect(options.stdout.text).toBe("");
  });

  it("aborts on the first failed command", async () => {
    const options = io();
    const executor = new ScriptedExecutor({ b: new Error("failed to send command: broken pipe") });

    const code = await runBatch(executor, ["a", "b", "c"], { ...options, waitMs: 0 });

    expect(code).toBe(1);
    expect(executor.calls).toEqual(["a", "b"]);
    expect(options.stderr.text).toBe("Command failed: failed to send command: broken pipe\n");
  });
});

// =============================================================================
// Line console
// =============================================================================

describe("runLineConsole", () => {
  it("prompts, runs commands and quits on q", async () => {
    const options = io();
    const executor = new ScriptedExecutor({ list: "0 players\n" });

    const code = await runLineConsole(executor, Readable.from(["list\n  \n", "say hi\nq\nnever\n"]), options);

    expect(code).toBe(0);
    expect(executor.calls).toEqual(["list", "say hi"]);
    expect(options.stdout.text).toBe(`${BANNER}> 0 players\n> > > `);
  });

  it("quits on Q as well", async () => {
    const executor = new ScriptedExecutor();

    await runLineConsole(executor, Readable.from(["Q\nlist\n"]), io());

    expect(executor.calls).toEqual([]);
  });

  it("sends stop and then ends", async () => {
    const executor = new ScriptedExecutor();

    await runLineConsole(executor, Readable.from(["stop\nlist\n"]), io());

    expect(executor.calls).toEqual(["stop"]);
  });

  it("reports a failed command and keeps going", async () => {
    const options = io();
    const executor = new ScriptedExecutor({ bad: new Error("invalid response ID (expected 195936478, got 7)") });

    const code = await runLineConsole(executor, Readable.from(["bad\nlist\n"]), options);

    expect(code).toBe(0);
    expect(executor.calls).toEqual(["bad", "list"]);
    expect(options.stderr.text).toBe("Error: invalid response ID (expected 195936478, got 7)\n");
  });

  it("ends at end of input", async () => {
    const options = io();

    const code = await runLineConsole(new ScriptedExecutor(), Readable.from([]), options);

    expect(code).toBe(0);
    expect(options.stdout.text).toBe(`${BANNER}> `);
  });
});
