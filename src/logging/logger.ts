export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug' | 'verbose' | 'ok';

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  log(level: LogLevel, message: string, meta?: LogMetadata): void;
}

export class NoopLogger implements Logger {
  log(): void { /* no-op */ }
}

type PrintableLevel = Exclude<LogLevel, 'none' | 'ok'>;

const SYMBOL: Record<PrintableLevel, string> = {
  error: '⚠',
  warn: '!',
  info: '›',
  debug: '≫',
  verbose: '💬',
};

const ORDER: PrintableLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

export class BasicLogger implements Logger {
  constructor(private min: LogLevel = 'info') {}

  private _should(level: PrintableLevel) {
    if (this.min === 'none') return false;
    if (this.min === 'verbose') return true;
    const min = this.min === 'ok' ? 'info' : this.min;
    return ORDER.indexOf(level) <= ORDER.indexOf(min);
  }

  log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level === 'none') return;
    const printable = level === 'ok' ? 'info' : level;
    if (!this._should(printable)) return;
    const sym = level === 'ok' ? '✓' : SYMBOL[printable];
    const base = `${sym} ${message}`.trim();
    if (meta) console.log(base, meta); else console.log(base);
  }
}

export function createLogger(level: LogLevel): Logger {
  return level === 'none' ? new NoopLogger() : new BasicLogger(level);
}
