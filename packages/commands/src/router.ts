/**
 * Console Input Router
 *
 * Pure function: takes one line of user input → decides what the console does.
 * No I/O, no state, no connection logic. Consoles call this and act on the result.
 */

import { getKeyword } from "./catalog.js";
import type { RouteResult } from "./types.js";

/**
 * Route a line of console input.
 *
 * @param line - Raw input line (untrimmed)
 */
export function routeInput(line: string): RouteResult {
  const command = line.trim();

  // Blank lines never cost a round trip
  if (!command) {
    return { kind: "skip" };
  }

  const keyword = getKeyword(command);
  if (keyword?.action === "quit") {
    return { kind: "quit" };
  }

  return {
    kind: "command",
    command,
    endsSession: keyword?.action === "send_then_quit",
  };
}
