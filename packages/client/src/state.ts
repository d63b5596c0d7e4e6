/**
 * Console State — Types and Reducer
 *
 * All Ink console state flows through a single reducer.
 * Connection callbacks and command results dispatch actions to update it.
 */

import type { ConnectionState } from "./connection.js";

// =============================================================================
// Transcript
// =============================================================================

export interface TranscriptEntry {
  id: string;
  kind: "command" | "response";
  /** Command as typed, or the already formatted response */
  text: string;
}

// =============================================================================
// Console State
// =============================================================================

export interface ConsoleState {
  connectionState: ConnectionState;

  /** Sent commands and their replies (rendered in <Static>) */
  transcript: TranscriptEntry[];

  /** Command waiting for its reply, if any. Input is disabled meanwhile. */
  pendingCommand: string | null;

  /** Submitted commands, oldest first, consecutive duplicates collapsed */
  history: string[];

  /** Set once the console should exit (q, stop, or lost connection) */
  ended: boolean;
}

export const initialState: ConsoleState = {
  connectionState: "authenticated",
  transcript: [],
  pendingCommand: null,
  history: [],
  ended: false,
};

// =============================================================================
// Actions
// =============================================================================

export type ConsoleAction =
  | { type: "SET_CONNECTION_STATE"; state: ConnectionState }
  | { type: "COMMAND_SENT"; command: string }
  | { type: "RESPONSE_RECEIVED"; text: string }
  | { type: "COMMAND_FAILED" }
  | { type: "END_SESSION" };

// =============================================================================
// Reducer
// =============================================================================

let entryCounter = 0;

export function consoleReducer(state: ConsoleState, action: ConsoleAction): ConsoleState {
  switch (action.type) {
    case "SET_CONNECTION_STATE":
      return {
        ...state,
        connectionState: action.state,
        ended: state.ended || action.state === "closed",
      };

    case "COMMAND_SENT": {
      const last = state.history[state.history.length - 1];
      return {
        ...state,
        pendingCommand: action.command,
        transcript: [
          ...state.transcript,
          { id: `entry-${++entryCounter}`, kind: "command", text: action.command },
        ],
        history: last === action.command ? state.history : [...state.history, action.command],
      };
    }

    case "RESPONSE_RECEIVED":
      // Silent mode and empty replies add nothing to the transcript
      if (!action.text) {
        return { ...state, pendingCommand: null };
      }
      return {
        ...state,
        pendingCommand: null,
        transcript: [
          ...state.transcript,
          { id: `entry-${++entryCounter}`, kind: "response", text: action.text },
        ],
      };

    case "COMMAND_FAILED":
      return { ...state, pendingCommand: null };

    case "END_SESSION":
      return { ...state, ended: true };

    default:
      return state;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** True while the console can take another command */
export function canSubmit(state: ConsoleState): boolean {
  return !state.ended && state.pendingCommand === null && state.connectionState === "authenticated";
}
