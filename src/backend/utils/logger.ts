/**
 * Backend logger with automatic sensitive data redaction.
 *
 * Every level writes to stderr: stdout is reserved for scan results so the
 * output of a run can be piped or redirected on its own.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

interface LoggerConfig {
  level: LogLevel;
  redactionEnabled: boolean;
  includeTimestamp: boolean;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Parse a LOG_LEVEL value. Unknown or empty values yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

const stderrSink: LogSink = (level, line) => {
  if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.error(line);
  }
};

export class SecureLogger {
  private config: LoggerConfig;
  private sink: LogSink;

  private readonly SENSITIVE_PATTERNS = [
    // Discogs personal access tokens (before the header patterns consume them)
    /Discogs\s+token=[^\s,'"]*/gi,

    // Authorization headers
    /Authorization:\s*Bearer\s+[^\s,]*/gi,
    /Authorization:\s*[^\s,]*/gi,
    /['"]\s*Authorization\s*['"]\s*:\s*['"][^'"]+['"]/gi,

    // Tokens in JSON payloads
    /['"]\s*token\s*['"]\s*:\s*['"][^'"]+['"]/gi,

    // Query parameters with sensitive names
    /[?&](token|key|secret)=[^&\s]*/gi,

    // Generic long hex strings (likely tokens/hashes)
    /[a-fA-F0-9]{32,}/g,
  ];

  constructor(config?: Partial<LoggerConfig>, sink: LogSink = stderrSink) {
    const isProduction = process.env.NODE_ENV === 'production';

    const defaultConfig: LoggerConfig = {
      level:
        parseLogLevel(process.env.LOG_LEVEL) ??
        (isProduction ? LogLevel.WARN : LogLevel.INFO),
      redactionEnabled: true,
      includeTimestamp: true,
    };

    this.config = { ...defaultConfig, ...config };
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private redactSensitiveData(data: unknown): string {
    let text = this.stringifyData(data);
    if (!this.config.redactionEnabled) {
      return text;
    }

    this.SENSITIVE_PATTERNS.forEach(pattern => {
      text = text.replace(pattern, match => {
        // Keep the beginning to show what type of data was redacted
        const colonIndex = match.indexOf(':');
        const equalIndex = match.indexOf('=');
        const splitIndex =
          colonIndex >= 0
            ? equalIndex >= 0
              ? Math.min(colonIndex, equalIndex)
              : colonIndex
            : equalIndex;
        const prefix = match.substring(
          0,
          Math.min(20, splitIndex >= 0 ? splitIndex + 1 : 0)
        );
        return `${prefix}[REDACTED]`;
      });
    });

    return text;
  }

  private stringifyData(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data instanceof Error) return `${data.name}: ${data.message}`;

    try {
      return JSON.stringify(data, null, 2);
    } catch {
      return String(data);
    }
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: string
  ): string {
    const timestamp = this.config.includeTimestamp
      ? new Date().toISOString()
      : '';

    const levelName = LogLevel[level];
    const contextStr = context ? `[${context}]` : '';

    return `${timestamp} ${levelName} ${contextStr} ${message}`
      .replace(/ {2,}/g, ' ')
      .trim();
  }

  private log(
    level: LogLevel,
    message: string,
    data?: unknown,
    context?: string
  ): void {
    if (level < this.config.level) return;

    const redactedMessage = this.redactSensitiveData(message);
    const redactedData =
      data !== undefined ? this.redactSensitiveData(data) : '';

    const fullMessage = redactedData
      ? `${redactedMessage}\n${redactedData}`
      : redactedMessage;

    this.sink(level, this.formatMessage(level, fullMessage, context));
  }

  debug(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.DEBUG, message, data, context);
  }

  info(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.INFO, message, data, context);
  }

  warn(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.WARN, message, data, context);
  }

  error(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.ERROR, message, data, context);
  }

  child(context: string): ContextLogger {
    return new ContextLogger(this, context);
  }
}

/**
 * Context logger that automatically includes context in all log messages
 */
export class ContextLogger {
  constructor(
    private parent: SecureLogger,
    private context: string
  ) {}

  debug(message: string, data?: unknown): void {
    this.parent.debug(message, data, this.context);
  }

  info(message: string, data?: unknown): void {
    this.parent.info(message, data, this.context);
  }

  warn(message: string, data?: unknown): void {
    this.parent.warn(message, data, this.context);
  }

  error(message: string, data?: unknown): void {
    this.parent.error(message, data, this.context);
  }
}

export const logger = new SecureLogger();

export const createLogger = (context: string): ContextLogger =>
  logger.child(context);
