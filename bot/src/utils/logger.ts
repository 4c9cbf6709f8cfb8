type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
  bold: "\x1b[1m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const CATEGORY_COLORS: Record<string, string> = {
  farm: COLORS.cyan,
  shop: COLORS.magenta,
  hero: COLORS.green,
  mission: COLORS.yellow,
  proxy: COLORS.gray,
  api: COLORS.yellow,
  sleep: COLORS.blue,
  state: COLORS.white,
};

let _minLevel: LogLevel = "info";
let _structuredMode = false;

/** Set minimum log level (default: info) */
export function setLogLevel(level: LogLevel): void {
  _minLevel = level;
}

/** Enable structured JSON output */
export function setStructuredMode(enabled: boolean): void {
  _structuredMode = enabled;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[_minLevel];
}

function timestamp(): string {
  return new Date().toISOString();
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function emitStructured(level: LogLevel, session: string | null, category: string | null, msg: string, args: unknown[]): void {
  const entry: Record<string, unknown> = {
    ts: timestamp(),
    level,
    msg: args.length > 0 ? `${msg} ${args.map(formatArg).join(" ")}` : msg,
  };
  if (category) entry.cat = category;
  if (session) entry.session = session;
  console.log(JSON.stringify(entry));
}

function emitPretty(level: LogLevel, session: string | null, category: string | null, msg: string, args: unknown[]): void {
  const ts = timestamp().slice(11, 23); // HH:MM:SS.mmm
  const levelColor = LEVEL_COLORS[level];
  const levelTag = level.toUpperCase().padEnd(5);
  const sessionTag = session ? `${COLORS.bold}${session}${COLORS.reset} | ` : "";
  const catTag = category
    ? `${CATEGORY_COLORS[category] || COLORS.white}${category.padEnd(7)}${COLORS.reset} `
    : "";

  console.log(
    `${COLORS.gray}[${ts}]${COLORS.reset} ${levelColor}${levelTag}${COLORS.reset} ${catTag}${sessionTag}${msg}`,
    ...args,
  );
}

function emit(level: LogLevel, session: string | null, category: string | null, msg: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  if (_structuredMode) {
    emitStructured(level, session, category, msg, args);
  } else {
    emitPretty(level, session, category, msg, args);
  }
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Logger bound to one account. Every runner gets its own so concurrent
 * sessions never share a context.
 */
export function createLogger(session: string | null = null) {
  return {
    // Level-based methods
    debug: (msg: string, ...args: unknown[]) => emit("debug", session, null, msg, args),
    info: (msg: string, ...args: unknown[]) => emit("info", session, null, msg, args),
    warn: (msg: string, ...args: unknown[]) => emit("warn", session, null, msg, args),
    error: (msg: string, ...args: unknown[]) => emit("error", session, null, msg, args),

    // Domain categories (info level, except state/api=debug)
    success: (msg: string, ...args: unknown[]) => emit("info", session, null, msg, args),
    farm: (msg: string, ...args: unknown[]) => emit("info", session, "farm", msg, args),
    shop: (msg: string, ...args: unknown[]) => emit("info", session, "shop", msg, args),
    hero: (msg: string, ...args: unknown[]) => emit("info", session, "hero", msg, args),
    mission: (msg: string, ...args: unknown[]) => emit("info", session, "mission", msg, args),
    proxy: (msg: string, ...args: unknown[]) => emit("info", session, "proxy", msg, args),
    sleep: (msg: string, ...args: unknown[]) => emit("info", session, "sleep", msg, args),
    api: (msg: string, ...args: unknown[]) => emit("debug", session, "api", msg, args),
    state: (msg: string, ...args: unknown[]) => emit("debug", session, "state", msg, args),
  };
}

export const log = createLogger();
