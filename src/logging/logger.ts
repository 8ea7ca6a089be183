/**
 * Status Logging
 *
 * Leveled, colorized status lines for the command line. Each command picks a
 * line style: "tag" (`[INFO] ...`) or "symbol" (`✓ ...`). Error-level lines go
 * to stderr and everything else to stdout.
 */

import type { RuntimeEnv } from "../runtime.js";

// =============================================================================
// Logger Types
// =============================================================================

export type StatusLevel = "debug" | "info" | "success" | "warn" | "error" | "fail";

/** Minimum level to emit; "silent" drops everything. */
export type StatusThreshold = StatusLevel | "silent";

export type StatusStyle = "tag" | "symbol";

export type StatusEntry = {
  timestamp: Date;
  level: StatusLevel;
  subsystem: string;
  message: string;
  /** "plain" lines and "heading" lines are printed without a level prefix. */
  kind: "status" | "plain" | "heading";
  /** Replaces the level's default mark (tag style) or symbol (symbol style). */
  mark?: string;
};

export type StatusLineOptions = {
  mark?: string;
};

export type StatusFormatter = (entry: StatusEntry) => string;

export interface StatusTransport {
  name: string;
  write(entry: StatusEntry): void;
}

export interface StatusLogger {
  readonly subsystem: string;

  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string, options?: StatusLineOptions): void;
  error(message: string): void;
  /** A failed check: error level, marked with ✗. */
  fail(message: string): void;
  /** Unprefixed line on stdout. */
  line(text?: string): void;
  /** Blank line followed by a `==== title ====` heading. */
  section(title: string): void;

  child(name: string): StatusLogger;
  isLevelEnabled(level: StatusLevel): boolean;
}

// =============================================================================
// Level Utilities
// =============================================================================

const LEVEL_PRIORITY: Record<StatusThreshold, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
  fail: 3,
  silent: 4,
};

export function shouldLog(level: StatusLevel, minLevel: StatusThreshold): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

/** Error and fail lines belong on stderr. */
export function isErrorLevel(level: StatusLevel): boolean {
  return level === "error" || level === "fail";
}

// =============================================================================
// Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[0;32m",
  yellow: "\x1b[1;33m",
  red: "\x1b[0;31m",
  blue: "\x1b[0;34m",
};

const TAGS: Record<StatusLevel, { text: string; color: string }> = {
  debug: { text: "[DEBUG]", color: COLORS.dim },
  info: { text: "[INFO]", color: COLORS.green },
  success: { text: "[INFO]", color: COLORS.green },
  warn: { text: "[WARN]", color: COLORS.yellow },
  error: { text: "[ERROR]", color: COLORS.red },
  fail: { text: "[ERROR]", color: COLORS.red },
};

// Marks prepended to the message in tag style.
const TAG_MARKS: Partial<Record<StatusLevel, string>> = {
  success: "✓ ",
  warn: "⚠ ",
  fail: "✗ ",
};

const SYMBOLS: Record<StatusLevel, { text: string; color?: string }> = {
  debug: { text: "·", color: COLORS.dim },
  info: { text: "ℹ" },
  success: { text: "✓", color: COLORS.green },
  warn: { text: "⚠", color: COLORS.yellow },
  error: { text: "✗", color: COLORS.red },
  fail: { text: "✗", color: COLORS.red },
};

export function createStatusFormatter(options?: {
  style?: StatusStyle;
  colors?: boolean;
}): StatusFormatter {
  const { style = "tag", colors = false } = options ?? {};
  const paint = (color: string | undefined, text: string) =>
    colors && color ? `${color}${text}${COLORS.reset}` : text;

  return (entry: StatusEntry): string => {
    if (entry.kind === "plain") return entry.message;
    if (entry.kind === "heading") return paint(COLORS.blue, `==== ${entry.message} ====`);

    // Debug lines carry the subsystem so child loggers can be told apart.
    const message = entry.level === "debug" ? `[${entry.subsystem}] ${entry.message}` : entry.message;

    if (style === "symbol") {
      const symbol = SYMBOLS[entry.level];
      return `${paint(symbol.color, entry.mark ?? symbol.text)} ${message}`;
    }

    const tag = TAGS[entry.level];
    const mark = entry.mark === undefined ? (TAG_MARKS[entry.level] ?? "") : `${entry.mark} `;
    return `${paint(tag.color, tag.text)} ${mark}${message}`;
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes formatted entries through the runtime: stderr for errors, stdout otherwise.
 */
export class RuntimeTransport implements StatusTransport {
  name = "runtime";
  private runtime: RuntimeEnv;
  private formatter: StatusFormatter;

  constructor(runtime: RuntimeEnv, formatter?: StatusFormatter) {
    this.runtime = runtime;
    this.formatter = formatter ?? createStatusFormatter();
  }

  write(entry: StatusEntry): void {
    const formatted = this.formatter(entry);
    if (isErrorLevel(entry.level)) {
      this.runtime.error(formatted);
    } else {
      this.runtime.log(formatted);
    }
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class StatusLoggerImpl implements StatusLogger {
  readonly subsystem: string;
  private level: StatusThreshold;
  private transports: StatusTransport[];

  constructor(options: {
    subsystem: string;
    level?: StatusThreshold;
    transports: StatusTransport[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports;
  }

  debug(message: string): void {
    this.log("debug", message, "status");
  }

  info(message: string): void {
    this.log("info", message, "status");
  }

  success(message: string): void {
    this.log("success", message, "status");
  }

  warn(message: string, options?: StatusLineOptions): void {
    this.log("warn", message, "status", options?.mark);
  }

  error(message: string): void {
    this.log("error", message, "status");
  }

  fail(message: string): void {
    this.log("fail", message, "status");
  }

  line(text = ""): void {
    this.log("info", text, "plain");
  }

  section(title: string): void {
    this.line();
    this.log("info", title, "heading");
  }

  child(name: string): StatusLogger {
    return new StatusLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
    });
  }

  isLevelEnabled(level: StatusLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: StatusLevel, message: string, kind: StatusEntry["kind"], mark?: string): void {
    if (!shouldLog(level, this.level)) return;

    const entry: StatusEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      kind,
      mark,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export type StatusLoggerOptions = {
  subsystem: string;
  runtime: RuntimeEnv;
  style?: StatusStyle;
  colors?: boolean;
  level?: StatusThreshold;
};

export function createStatusLogger(options: StatusLoggerOptions): StatusLogger {
  const formatter = createStatusFormatter({ style: options.style, colors: options.colors });
  return new StatusLoggerImpl({
    subsystem: options.subsystem,
    level: options.level,
    transports: [new RuntimeTransport(options.runtime, formatter)],
  });
}

/**
 * Decide whether to emit ANSI colors. An explicit flag wins, then NO_COLOR,
 * then FORCE_COLOR, then whether stdout is a terminal.
 */
export function resolveColorSupport(options: {
  flag?: boolean;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}): boolean {
  if (options.flag === false) return false;
  if (options.env.NO_COLOR) return false;
  const force = options.env.FORCE_COLOR;
  if (force !== undefined) return force !== "0" && force !== "false";
  return options.isTTY;
}
