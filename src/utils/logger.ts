/**
 * Structured Logger Utility
 * Provides clean, consistent logging throughout the advisory pipeline
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogContext {
  decisionContext?: string;
  component?: string;
  peer?: string;
  url?: string;
  outcome?: string;
  step?: string;
  duration?: number;
  [key: string]: string | number | boolean | undefined;
}

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

export class Logger {
  private static instance: Logger;
  private minLevel: LogLevel = LogLevel.DEBUG;
  private enableTimestamps: boolean = true;

  private constructor() {
    // Check environment for log level
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.minLevel = envLevel;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private getLevelPriority(level: LogLevel): number {
    const priorities: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 1,
      [LogLevel.WARN]: 2,
      [LogLevel.ERROR]: 3
    };
    return priorities[level];
  }

  private shouldLog(level: LogLevel): boolean {
    return this.getLevelPriority(level) >= this.getLevelPriority(this.minLevel);
  }

  private formatContext(ctx: LogContext): string {
    const parts: string[] = [];

    if (ctx.decisionContext) {parts.push(`ctx=${ctx.decisionContext.substring(0, 32)}`);}
    if (ctx.component) {parts.push(`comp=${ctx.component}`);}
    if (ctx.peer) {parts.push(`peer=${ctx.peer}`);}
    if (ctx.url) {parts.push(`url=${ctx.url}`);}
    if (ctx.outcome) {parts.push(`outcome=${ctx.outcome}`);}
    if (ctx.step) {parts.push(`step=${ctx.step}`);}
    if (ctx.duration !== undefined) {parts.push(`duration=${ctx.duration}ms`);}

    return parts.length > 0 ? `[${parts.join(' | ')}]` : '';
  }

  formatMessage(level: LogLevel, message: string, ctx?: LogContext, data?: unknown): string {
    const parts: string[] = [];

    if (this.enableTimestamps) {
      parts.push(new Date().toISOString());
    }

    parts.push(`[${level}]`);

    if (ctx) {
      const contextStr = this.formatContext(ctx);
      if (contextStr) {parts.push(contextStr);}
    }

    parts.push(message);

    if (data !== undefined) {
      if (typeof data === 'string') {
        // Truncate long strings
        const maxLen = 500;
        parts.push(data.length > maxLen ? data.substring(0, maxLen) + '...' : data);
      } else if (data instanceof Error) {
        parts.push(`${data.name}: ${data.message}`);
      } else {
        parts.push(JSON.stringify(data));
      }
    }

    return parts.join(' ');
  }

  debug(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, ctx, data));
    }
  }

  info(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, ctx, data));
    }
  }

  warn(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, ctx, data));
    }
  }

  error(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, ctx, data));
    }
  }

  // Convenience methods for common log patterns
  acquisitionStart(decisionContext: string, endpointCount: number, source: string): void {
    this.info(`┌── VERDICT ACQUISITION ─────────────────────────────────────────`, { decisionContext });
    this.info(`│ Endpoints: ${endpointCount} (source: ${source})`, { decisionContext, component: 'Acquirer' });
  }

  acquisitionEnd(decisionContext: string, verdictCount: number, endpointCount: number, duration: number): void {
    this.info(`└── ACQUISITION COMPLETE: ${verdictCount}/${endpointCount} verdicts ──────────────`, {
      decisionContext,
      duration
    });
  }

  peerOutcome(peer: string, outcome: string, duration: number, detail?: string): void {
    const ok = outcome === 'verdict';
    const status = ok ? '✓' : '✗';
    const message = `  ├─ ${status} ${detail ?? outcome}`;
    if (ok) {
      this.debug(message, { peer, outcome, duration });
    } else if (outcome === 'non_conforming' || outcome === 'no_usable_payload') {
      this.info(message, { peer, outcome, duration });
    } else {
      this.warn(message, { peer, outcome, duration });
    }
  }

  advisoryComputed(decisionContext: string, recommendation: string, consensusLevel: number, verdictCount: number): void {
    this.info(`Advisory: ${recommendation} (consensus=${consensusLevel.toFixed(4)}, verdicts=${verdictCount})`, {
      decisionContext,
      component: 'Coordinator'
    });
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
