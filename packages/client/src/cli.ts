#!/usr/bin/env -S node --import tsx
/**
 * rcon-console CLI — send RCON commands to a game server
 *
 * Usage:
 *   rcon-console -H my.server -p secret "say Restarting in 5 minutes" save-all
 *   rcon-console -H my.server -p secret          (interactive console)
 */

import {
  CLIENT_NAME,
  CLIENT_VERSION,
  MAX_WAIT_SECONDS,
  MIN_WAIT_SECONDS,
  UsageError,
  parseCliArgs,
  type ClientConfig,
  type CliRequest,
} from "./config.js";
import { CONSOLE_KEYWORDS } from "@rcon-console/commands";
import { Connection } from "./connection.js";
import { errorMessage, runBatch, runLineConsole } from "./runner.js";

function printHelp(): void {
  const keywords = CONSOLE_KEYWORDS.map((k) => `  ${k.name.padEnd(14)}  ${k.description}`).join("\n");
  console.log(`Usage: ${CLIENT_NAME} [OPTIONS] [COMMANDS]

Send rcon commands to a Minecraft server.

Options:
  -H <host>       Server address (default: localhost)
  -P <port>       Port (default: 25575)
  -p <password>   Rcon password
  -t              Terminal mode
  -s              Silent mode
  -c              Disable colors
  -r              Output raw packets
  -w <seconds>    Wait between each command (${MIN_WAIT_SECONDS}-${MAX_WAIT_SECONDS}s)
  -h              Print usage
  -v              Version information

Server address, port and password can be set with the following environment variables:
  MCRCON_HOST
  MCRCON_PORT
  MCRCON_PASS

- Terminal mode starts when no commands are given
- Command-line options override environment variables
- Commands with spaces must be enclosed in quotes

Console keywords (any case):
${keywords}

Example:
  ${CLIENT_NAME} -H my.minecraft.server -p password -w 5 "say Server is restarting!" save-all stop
`);
}

async function runSession(config: ClientConfig, commands: string[]): Promise<number> {
  const connection = new Connection(
    { host: config.host, port: config.port },
    {
      onRetry: (attempt, error) => {
        process.stderr.write(`⟳ Connect attempt ${attempt} failed (${error.message}), retrying...\n`);
      },
    },
  );

  try {
    await connection.connect();
  } catch (err) {
    process.stderr.write(`Connection failed: ${errorMessage(err)}\n`);
    return 1;
  }

  try {
    try {
      await connection.authenticate(config.password);
    } catch (err) {
      process.stderr.write(`Authentication failed: ${errorMessage(err)}\n`);
      return 1;
    }

    const io = { display: config.display, stdout: process.stdout, stderr: process.stderr };

    if (!config.terminal) {
      return await runBatch(connection, commands, { ...io, waitMs: config.waitMs });
    }

    if (process.stdin.isTTY) {
      // Loaded lazily: batch runs never pay for React
      const { runConsoleApp } = await import("./app.js");
      return await runConsoleApp(connection, config.display);
    }

    return await runLineConsole(connection, process.stdin, io);
  } finally {
    connection.close();
  }
}

/** Parse argv; usage errors are reported here and yield null */
function readRequest(): CliRequest | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`${err.message}\nTry '${CLIENT_NAME} -h' for help.\n`);
    return null;
  }
}

async function main(): Promise<number> {
  const request = readRequest();
  if (!request) return 1;

  if (request.kind === "help") {
    printHelp();
    return 0;
  }
  if (request.kind === "version") {
    console.log(`${CLIENT_NAME} ${CLIENT_VERSION}`);
    return 0;
  }

  // No cooperative cancellation: an interrupt ends the process on the spot.
  // The Ink console handles Ctrl-C itself while it is mounted.
  const interrupt = () => {
    process.stdout.write("\nDisconnecting...\n");
    process.exit(0);
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  return runSession(request.config, request.commands);
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  });
