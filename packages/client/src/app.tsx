/**
 * Interactive Console — Ink Application
 *
 * Renders the terminal-mode UI on top of an authenticated connection:
 * - Transcript of commands and replies (in <Static>)
 * - Status bar
 * - Command input with ↑↓ history
 *
 * Errors go to stderr, replies to stdout, as in batch mode.
 */

import React, { useReducer, useCallback, useState, useEffect } from "react";
import { Box, Text, Static, render, useApp, useInput, useStderr } from "ink";
import TextInput from "ink-text-input";
import { routeInput } from "@rcon-console/commands";
import type { Connection, ConnectionState } from "./connection.js";
import { formatResponse, type DisplayOptions } from "./format.js";
import { errorMessage } from "./runner.js";
import {
  consoleReducer,
  canSubmit,
  initialState,
  type ConsoleState,
  type TranscriptEntry,
} from "./state.js";

// =============================================================================
// Main App
// =============================================================================

interface AppProps {
  connection: Connection;
  display: DisplayOptions;
}

export default function App({ connection, display }: AppProps) {
  const { exit } = useApp();
  const { write: writeStderr } = useStderr();
  const [state, dispatch] = useReducer(consoleReducer, {
    ...initialState,
    connectionState: connection.connectionState,
  });
  const [input, setInput] = useState("");
  const [historyOffset, setHistoryOffset] = useState(-1);

  useEffect(
    () => connection.watchState((connState) => dispatch({ type: "SET_CONNECTION_STATE", state: connState })),
    [connection],
  );

  useEffect(() => {
    if (state.ended) exit();
  }, [state.ended, exit]);

  const runCommand = useCallback(
    async (command: string, endsSession: boolean) => {
      dispatch({ type: "COMMAND_SENT", command });
      try {
        const body = await connection.execute(command);
        // Ink renders text, so the bytes are decoded here; <Text> adds its own line break
        const text = formatResponse(body, display).toString("utf-8").replace(/\n$/, "");
        dispatch({ type: "RESPONSE_RECEIVED", text });
      } catch (err) {
        writeStderr(`Error: ${errorMessage(err)}\n`);
        dispatch({ type: "COMMAND_FAILED" });
      }
      if (endsSession) dispatch({ type: "END_SESSION" });
    },
    [connection, display, writeStderr],
  );

  const handleSubmit = useCallback(
    (value: string) => {
      setInput("");
      setHistoryOffset(-1);

      const route = routeInput(value);
      if (route.kind === "skip") return;
      if (route.kind === "quit") {
        dispatch({ type: "END_SESSION" });
        return;
      }
      void runCommand(route.command, route.endsSession);
    },
    [runCommand],
  );

  const active = canSubmit(state);

  // Up/Down walk the command history; TextInput ignores those keys
  useInput(
    (_input, key) => {
      const { history } = state;
      if (key.upArrow && history.length > 0) {
        const offset = Math.min(historyOffset + 1, history.length - 1);
        setHistoryOffset(offset);
        setInput(history[history.length - 1 - offset] ?? "");
      } else if (key.downArrow && historyOffset >= 0) {
        const offset = historyOffset - 1;
        setHistoryOffset(offset);
        setInput(offset < 0 ? "" : history[history.length - 1 - offset] ?? "");
      }
    },
    { isActive: active },
  );

  return (
    <Box flexDirection="column">
      <Static items={state.transcript}>
        {(entry) => <EntryView key={entry.id} entry={entry} />}
      </Static>

      <StatusBar address={connection.address} state={state} />

      {active ? (
        <Box>
          <Text color="green">❯ </Text>
          <TextInput
            value={input}
            onChange={setInput}
            onSubmit={handleSubmit}
            placeholder="Type a command..."
          />
        </Box>
      ) : (
        <Box>
          <Text color="gray">⏳ </Text>
          <Text dimColor>
            {state.pendingCommand !== null ? `Waiting for "${state.pendingCommand}"...` : "Disconnected"}
          </Text>
        </Box>
      )}
    </Box>
  );
}

// =============================================================================
// Status Bar
// =============================================================================

const stateColor: Record<ConnectionState, string> = {
  disconnected: "red",
  connected: "yellow",
  authenticated: "green",
  closed: "red",
};

const stateLabel: Record<ConnectionState, string> = {
  disconnected: "● Disconnected",
  connected: "◌ Logging in...",
  authenticated: "● Logged in",
  closed: "● Closed",
};

function StatusBar({ address, state }: { address: string; state: ConsoleState }) {
  return (
    <Box gap={2}>
      <Text color={stateColor[state.connectionState]}>{stateLabel[state.connectionState]}</Text>
      <Text dimColor>{address}</Text>
      <Text dimColor>Q or Ctrl-C to disconnect</Text>
    </Box>
  );
}

// =============================================================================
// Transcript Entry
// =============================================================================

function EntryView({ entry }: { entry: TranscriptEntry }) {
  if (entry.kind === "command") {
    return (
      <Text color="cyan" bold>
        {"> "}
        {entry.text}
      </Text>
    );
  }
  return <Text>{entry.text}</Text>;
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Render the console and resolve once the user leaves it.
 */
export async function runConsoleApp(connection: Connection, display: DisplayOptions): Promise<number> {
  const instance = render(<App connection={connection} display={display} />);
  await instance.waitUntilExit();
  return 0;
}
