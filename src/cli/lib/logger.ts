/**
 * quakecat CLI Logging
 *
 * Human-readable output for interactive use and JSON lines for machine
 * consumption. Everything goes to stderr: stdout carries table output.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, Logger } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  readonly service?: string;
  /** Write sink, stderr by default */
  readonly write?: (line: string) => void;
}

export interface ProgressOptions {
  total: number;
  current: number;
  label?: string;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

/**
 * CLI logger; also usable as the library Logger so catalog warnings
 * (possible undercounts, skipped events) show up in the same stream
 */
export class CLILogger implements Logger {
  private readonly config: CLILoggerConfig;
  private readonly write: (line: string) => void;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'quakecat',
      ...config,
    };
    this.write = config.write ?? ((line: string) => process.stderr.write(`${line}\n`));
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} ${message}`;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.write(
      this.config.json ? this.formatJson(level, message, metadata) : this.formatHuman(level, message, metadata)
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: this.getElapsedMs(), ...metadata };
    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Progress for detail fetches; a bar in human mode, entries in JSON mode
   */
  progress(options: ProgressOptions): void {
    const { total, current, label } = options;
    if (!this.shouldLog('info')) return;
    const percent = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.config.json) {
      this.info('Progress', { current, total, percent, label });
      return;
    }

    const barWidth = 30;
    const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
    const bar = `[${'='.repeat(filled)}${' '.repeat(barWidth - filled)}]`;
    const labelStr = label ? ` ${label}` : '';
    process.stderr.write(`\r${COLORS.dim}${bar}${COLORS.reset} ${percent}% (${current}/${total})${labelStr}`);
    if (current >= total) {
      process.stderr.write('\n');
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'warn',
    json: config.json ?? false,
    service: config.service ?? 'quakecat',
    write: config.write,
  });
}
