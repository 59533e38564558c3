/**
 * Backend logger with level filtering and redaction of Last.fm credentials.
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

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
]);

/**
 * Resolves the minimum level from LOG_LEVEL, falling back to WARN in
 * production and DEBUG everywhere else.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = LEVEL_NAMES.get(env.LOG_LEVEL?.toLowerCase() ?? '');
  if (configured !== undefined) {
    return configured;
  }
  return env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;
}

class SecureLogger {
  private config: LoggerConfig;

  private readonly SENSITIVE_PATTERNS = [
    /['"]\s*api_key\s*['"]\s*:\s*['"][^'"]+['"]/gi,
    /['"]\s*apiKey\s*['"]\s*:\s*['"][^'"]+['"]/gi,
    /[?&]api_key=[^&\s]*/gi,
    // Last.fm keys are 32-char hex strings
    /[a-fA-F0-9]{32,}/g,
  ];

  constructor(config?: Partial<LoggerConfig>) {
    const defaultConfig: LoggerConfig = {
      level: resolveLogLevel(),
      redactionEnabled: true,
      includeTimestamp: true,
    };

    this.config = { ...defaultConfig, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  redact(data: unknown): string {
    let text = this.stringifyData(data);
    if (!this.config.redactionEnabled) {
      return text;
    }

    this.SENSITIVE_PATTERNS.forEach(pattern => {
      text = text.replace(pattern, match => {
        const colonIndex = match.indexOf(':');
        const equalIndex = match.indexOf('=');
        const splitIndex =
          colonIndex >= 0
            ? equalIndex >= 0
              ? Math.min(colonIndex, equalIndex)
              : colonIndex
            : equalIndex;
        const prefix = splitIndex >= 0 ? match.substring(0, splitIndex + 1) : '';
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

    return `${timestamp} ${levelName} ${contextStr} ${message}`.trim();
  }

  private log(
    level: LogLevel,
    message: string,
    data?: unknown,
    context?: string
  ): void {
    if (level < this.config.level) return;

    const redactedMessage = this.redact(message);
    const redactedData = data !== undefined ? this.redact(data) : '';

    const fullMessage = redactedData
      ? `${redactedMessage}\n${redactedData}`
      : redactedMessage;

    const formattedMessage = this.formatMessage(level, fullMessage, context);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
    }
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
 * Logger bound to a fixed context tag, e.g. `[LastFmService]`.
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
