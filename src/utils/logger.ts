/**
 * Console logger for pkgdelta
 *
 * Every line goes to stderr: stdout is reserved for command results
 * (package lists, versions) that CI scripts capture.
 */

export interface LoggerOptions {
  /** Only print errors */
  quiet: boolean;
  /** Print debug lines */
  verbose: boolean;
  /** Disable ANSI colors */
  noColor: boolean;
  /** Prefix each line with an ISO timestamp */
  timestamps: boolean;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  quiet: false,
  verbose: false,
  noColor: false,
  timestamps: false,
};

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const COLORS: Record<Color, string> = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
};

const RESET = '\x1b[0m';

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  private paint(text: string, color: Color): string {
    if (this.options.noColor) return text;
    return `${COLORS[color]}${text}${RESET}`;
  }

  private stamp(line: string): string {
    if (!this.options.timestamps) return line;
    return `[${new Date().toISOString()}] ${line}`;
  }

  private write(line: string): void {
    if (this.options.quiet) return;
    console.error(this.stamp(line));
  }

  discovery(message: string): void {
    this.write(`${this.paint('🔍', 'cyan')} ${message}`);
  }

  analysis(message: string): void {
    this.write(`${this.paint('🔬', 'blue')} ${message}`);
  }

  success(message: string): void {
    this.write(`${this.paint('✓', 'green')} ${message}`);
  }

  warning(message: string): void {
    this.write(`${this.paint('⚠', 'yellow')} ${message}`);
  }

  /**
   * Errors are printed even in quiet mode
   */
  error(message: string): void {
    console.error(this.stamp(`${this.paint('✗', 'red')} ${message}`));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.write(this.paint(`→ ${message}`, 'dim'));
  }

  section(title: string): void {
    this.write(this.paint(`=== ${title} ===`, 'bold'));
  }

  info(key: string, value: string | number): void {
    this.write(`  ${this.paint(`${key}:`, 'dim')} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    this.write(`${'  '.repeat(indent)}• ${text}`);
  }
}

export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
