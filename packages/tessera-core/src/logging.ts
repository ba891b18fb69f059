// Debug logging for sessions.
//
// Namespaces are enabled with a pattern in the style of npm's debug
// package: a comma or space separated list where `*` matches anything and
// a leading `-` excludes. The pattern comes from the session's `debug`
// option, or from the DEBUG environment variable when that is not given.
//
// Namespaces used:
//   tessera:send     - objects queued, aborts, suspensions
//   tessera:recv     - objects delivered, subtrees abandoned
//   tessera:session  - teardown
//
// Enabled loggers write one structured object per event with console.log.

export interface Logger {
  readonly namespace: string;
  readonly enabled: boolean;
  log(event: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by a debug pattern.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/** The pattern in effect when a session gives none. */
export function defaultDebugPattern(): string | undefined {
  return typeof process === "undefined" ? undefined : process.env.DEBUG;
}

/**
 * Create a logger for one namespace. Whether it is enabled is decided
 * once, here.
 *
 * @example
 * ```typescript
 * const log = createLogger("tessera:recv", "tessera:*,-tessera:send");
 * log.log("deliver", { ok: true });
 * // console: tessera:recv deliver { type: "deliver", ok: true }
 * ```
 */
export function createLogger(namespace: string, debug = defaultDebugPattern()): Logger {
  const enabled = isEnabled(namespace, debug);
  return {
    namespace,
    enabled,
    log(event: string, data: Record<string, unknown> = {}): void {
      if (!enabled) return;
      console.log(`${namespace} ${event}`, { type: event, ...data });
    },
  };
}

/** Render an error for a log object. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const where = "where" in error && typeof error.where === "string" ? error.where : undefined;
    return where === undefined
      ? { name: error.name, message: error.message }
      : { name: error.name, message: error.message, where };
  }
  return { error };
}
