export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export class Logger {
  private level: LogLevel;
  private patterns: RegExp[];
  private readonly scope: string | undefined;
  private readonly parent: Logger | undefined;

  constructor(level: LogLevel = 'warn', redactPatterns: string[] = [], scope?: string, parent?: Logger) {
    this.level = level;
    this.patterns = redactPatterns.map((p) => new RegExp(p, 'gi'));
    this.scope = scope;
    this.parent = parent;
  }

  /**
   * Scoped logger sharing this logger's level and redaction rules.
   * Level changes on the root are seen by every child.
   */
  child(scope: string): Logger {
    const name = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, [], name, this.root());
  }

  private root(): Logger {
    return this.parent ?? this;
  }

  private redact(message: string): string {
    let result = message;
    for (const pattern of this.root().patterns) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.root().level];
  }

  private write(level: LogLevel, prefix: string, message: string, ...args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    const redacted = this.redact(message);
    const extra = args.map((a) => (typeof a === 'string' ? this.redact(a) : a));
    const scope = this.scope ? ` [${this.scope}]` : '';
    process.stderr.write(`${prefix}${scope} ${redacted}${extra.length ? ' ' + extra.join(' ') : ''}\n`);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', '[ERROR]', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', '[WARN] ', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', '[INFO] ', message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', '[DEBUG]', message, ...args);
  }

  setLevel(level: LogLevel): void {
    this.root().level = level;
  }

  setRedactPatterns(patterns: string[]): void {
    this.root().patterns = patterns.map((p) => new RegExp(p, 'gi'));
  }
}

// Process logger, configured by setupRuntime in src/commands/setup.ts
export const logger = new Logger();
