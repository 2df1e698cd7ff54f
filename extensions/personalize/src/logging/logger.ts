/**
 * Workflow Logging Subsystem
 *
 * Structured, levelled logging for the reconciliation engine, the scheduler and
 * the notification sinks. Loggers form a subsystem hierarchy
 * (`personalize/scheduler/store`) and carry resource, task and execution
 * context onto every entry they write. A logger and all of its children share
 * one level, one transport list and one set of redaction patterns.
 */

// =============================================================================
// Types
// =============================================================================

export const WORKFLOW_LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type WorkflowLogLevel = (typeof WORKFLOW_LOG_LEVELS)[number];

export type LogContext = {
  resourceId?: string;
  taskName?: string;
  executionArn?: string;
};

export type WorkflowLogEntry = LogContext & {
  timestamp: Date;
  level: WorkflowLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
};

export type LogFormatter = (entry: WorkflowLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: WorkflowLogEntry): void;
}

export interface WorkflowLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): WorkflowLogger;
  withContext(context: LogContext): WorkflowLogger;
}

// =============================================================================
// Levels
// =============================================================================

function rank(level: WorkflowLogLevel): number {
  return WORKFLOW_LOG_LEVELS.indexOf(level);
}

export function compareLogLevels(a: WorkflowLogLevel, b: WorkflowLogLevel): -1 | 0 | 1 {
  const diff = rank(a) - rank(b);
  return diff === 0 ? 0 : diff < 0 ? -1 : 1;
}

/**
 * True when `level` is at or above `minLevel`.
 */
export function shouldLog(level: WorkflowLogLevel, minLevel: WorkflowLogLevel): boolean {
  return rank(level) >= rank(minLevel);
}

export function isWorkflowLogLevel(value: unknown): value is WorkflowLogLevel {
  return WORKFLOW_LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Formatting
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
} as const;

const LEVEL_COLOR: Record<WorkflowLogLevel, string> = {
  trace: ANSI.dim,
  debug: ANSI.cyan,
  info: ANSI.green,
  warn: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.magenta,
};

const CONTEXT_LABELS: ReadonlyArray<[keyof LogContext, string]> = [
  ["resourceId", "resource"],
  ["taskName", "task"],
  ["executionArn", "execution"],
];

export type FormatterOptions = {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
};

/**
 * One line per entry: `<iso> LEVEL [subsystem] message (context) {metadata}`,
 * followed by the error and its stack when the entry carries one.
 */
export function createDefaultFormatter(options: FormatterOptions = {}): LogFormatter {
  const colors = options.colors ?? process.stderr.isTTY ?? false;
  const timestamps = options.timestamps ?? true;
  const includeMetadata = options.includeMetadata ?? true;
  const paint = (color: string, text: string) => (colors ? `${color}${text}${ANSI.reset}` : text);

  return (entry) => {
    const line: string[] = [];
    if (timestamps) line.push(paint(ANSI.dim, entry.timestamp.toISOString()));
    line.push(paint(LEVEL_COLOR[entry.level], entry.level.toUpperCase().padEnd(5)));
    line.push(paint(ANSI.blue, `[${entry.subsystem}]`));
    line.push(entry.message);

    const context = CONTEXT_LABELS.flatMap(([key, label]) => (entry[key] ? [`${label}=${entry[key]}`] : []));
    if (context.length > 0) line.push(paint(ANSI.dim, `(${context.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      line.push(paint(ANSI.dim, JSON.stringify(entry.metadata)));
    }

    let text = line.join(" ");
    if (entry.error) {
      text += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) text += `\n${entry.error.stack}`;
    }
    return text;
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes formatted entries to stderr, keeping stdout free for command output.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  private readonly format: LogFormatter;

  constructor(formatter: LogFormatter = createDefaultFormatter()) {
    this.format = formatter;
  }

  write(entry: WorkflowLogEntry): void {
    process.stderr.write(`${this.format(entry)}\n`);
  }
}

/**
 * Keeps entries in memory for assertions.
 */
export class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: WorkflowLogEntry[] = [];

  write(entry: WorkflowLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: WorkflowLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger
// =============================================================================

type LoggerCore = {
  level: WorkflowLogLevel;
  transports: LogTransport[];
  redaction?: RegExp;
};

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

class SubsystemLogger implements WorkflowLogger {
  constructor(
    private readonly core: LoggerCore,
    readonly subsystem: string,
    private readonly context: LogContext = {},
  ) {}

  trace(message: string, meta?: Record<string, unknown>): void {
    this.write("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.write("fatal", message, meta);
  }

  child(name: string): WorkflowLogger {
    return new SubsystemLogger(this.core, `${this.subsystem}/${name}`, this.context);
  }

  withContext(context: LogContext): WorkflowLogger {
    return new SubsystemLogger(this.core, this.subsystem, { ...this.context, ...context });
  }

  private write(level: WorkflowLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.core.level)) return;

    const entry: WorkflowLogEntry = {
      ...this.context,
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
    };
    if (meta) {
      // an Error under `error` moves to the entry's error slot
      const { error, ...rest } = meta;
      if (error instanceof Error) {
        entry.error = { name: error.name, message: error.message, stack: error.stack };
        entry.metadata = this.redactRecord(rest);
      } else {
        entry.metadata = this.redactRecord(meta);
      }
    }

    for (const transport of this.core.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(
          `log transport ${transport.name} failed: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
  }

  private redact(text: string): string {
    return this.core.redaction ? text.replace(this.core.redaction, "[REDACTED]") : text;
  }

  private redactRecord(record: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(record).map(([key, value]) => [
        key,
        typeof value === "string" ? this.redact(value) : isPlainRecord(value) ? this.redactRecord(value) : value,
      ]),
    );
  }
}

// =============================================================================
// Factory
// =============================================================================

export type LoggingConfig = {
  level?: WorkflowLogLevel;
  /** The console when empty */
  transports?: LogTransport[];
  /** Regular expression sources; matches are replaced with `[REDACTED]` */
  redactPatterns?: string[];
};

export const ROOT_SUBSYSTEM = "personalize";

/**
 * Create a root logger for `personalize/<subsystem>`.
 */
export function createWorkflowLogger(subsystem: string, config: LoggingConfig = {}): WorkflowLogger {
  const patterns = config.redactPatterns ?? [];
  const core: LoggerCore = {
    level: config.level ?? "info",
    transports: config.transports?.length ? config.transports : [new ConsoleTransport()],
    redaction: patterns.length > 0 ? new RegExp(patterns.map((p) => `(?:${p})`).join("|"), "gi") : undefined,
  };
  return new SubsystemLogger(core, `${ROOT_SUBSYSTEM}/${subsystem}`);
}

let globalLogger: WorkflowLogger | undefined;

/**
 * The process-wide logger, or a child of it for `subsystem`.
 */
export function getWorkflowLogger(subsystem?: string): WorkflowLogger {
  globalLogger ??= createWorkflowLogger("core");
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalWorkflowLogger(logger: WorkflowLogger): void {
  globalLogger = logger;
}
