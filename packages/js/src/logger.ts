type LogLevel = 'INFO' | 'ERROR' | 'WARN' | 'DEBUG';

/**
 * Console logger for the command-line tools and the MCP server.
 *
 * Every level goes to stderr: stdout carries MCP protocol messages.
 * Debug lines are written only when `PROV_JSONLD_DEBUG` is set.
 */
export class Logger {
  constructor(private readonly scope?: string) {}

  private logInternal(level: LogLevel, message: string, meta?: unknown): void {
    const origin = this.scope !== undefined ? ` [${this.scope}]` : '';
    const logMessage = `[${level}] ${new Date().toISOString()}${origin} - ${message}`;
    const consoleMethod = level === 'WARN' ? console.warn : console.error;

    if (meta === undefined) {
      consoleMethod(logMessage);
    } else {
      consoleMethod(logMessage, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    this.logInternal('INFO', message, meta);
  }

  error(message: string, error?: unknown): void {
    this.logInternal('ERROR', message, error);
  }

  warn(message: string, meta?: unknown): void {
    this.logInternal('WARN', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    if (process.env.PROV_JSONLD_DEBUG) {
      this.logInternal('DEBUG', message, meta);
    }
  }
}
