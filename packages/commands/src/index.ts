// Types
export type { ConsoleKeyword, KeywordAction, RouteResult } from "./types.js";

// Catalog
export { CONSOLE_KEYWORDS, getKeyword, endsSession } from "./catalog.js";

// Router
export { routeInput } from "./router.js";
