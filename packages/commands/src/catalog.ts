/**
 * Console Keyword Catalog
 *
 * Words the client handles itself instead of treating as ordinary server
 * commands. This is the ONE place where they are defined.
 */

import type { ConsoleKeyword } from "./types.js";

export const CONSOLE_KEYWORDS: readonly ConsoleKeyword[] = [
  {
    name: "q",
    description: "Disconnect without sending anything",
    action: "quit",
  },
  {
    // Servers tend to stop answering once they begin shutting down
    name: "stop",
    description: "Stop the server, then disconnect after its reply",
    action: "send_then_quit",
  },
] as const;

/** Lookup map keyed by lower-cased name */
const keywordsByName = new Map<string, ConsoleKeyword>(
  CONSOLE_KEYWORDS.map((keyword) => [keyword.name.toLowerCase(), keyword]),
);

/** Get a keyword by name (any case), or undefined if it is an ordinary command */
export function getKeyword(name: string): ConsoleKeyword | undefined {
  return keywordsByName.get(name.toLowerCase());
}

/** True when sending `command` should end the console or batch afterwards */
export function endsSession(command: string): boolean {
  return getKeyword(command.trim())?.action === "send_then_quit";
}
