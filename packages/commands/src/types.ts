/**
 * Console command types — UI-technology agnostic.
 *
 * Both the line console and the Ink console route input through these,
 * so keyword handling is identical everywhere.
 */

// =============================================================================
// Console Keywords — words the client itself reacts to
// =============================================================================

/**
 * What the client does with a keyword.
 * - `quit`: end the console without sending anything
 * - `send_then_quit`: send to the server, then end the console
 */
export type KeywordAction = "quit" | "send_then_quit";

export interface ConsoleKeyword {
  /** Keyword as typed (matched case-insensitively) */
  name: string;
  /** Human-readable description, shown in the help text */
  description: string;
  action: KeywordAction;
}

// =============================================================================
// Routed input — what a line of console input turns into
// =============================================================================

export type RouteResult =
  | { kind: "skip" }
  | { kind: "quit" }
  | { kind: "command"; command: string; endsSession: boolean };
