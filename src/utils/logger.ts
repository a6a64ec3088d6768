/**
 * Live execution logger for plainstep.
 *
 * All output goes to stderr by default so stdout stays clean for JSON
 * contract output. Emoji prefixes give instant visual context in the
 * terminal. Components receive a Logger at construction; nothing here
 * holds process-wide state.
 */

// ── Port ────────────────────────────────────────────────────

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  debug(message: string): void;
  step(index: number, total: number, description: string): void;
  stepResult(index: number, total: number, success: boolean, description: string): void;
  section(title: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Line sink. Defaults to stderr. */
  write?: (line: string) => void;
  /** Emit `debug` lines (resolver lookups and similar chatter). */
  verbose?: boolean;
}

// ── Factory ─────────────────────────────────────────────────

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? writeStderr;
  const verbose = options.verbose ?? false;

  return {
    info(message) {
      write(`ℹ️  ${message}`);
    },

    detail(message) {
      write(`   ${message}`);
    },

    debug(message) {
      if (verbose) write(`🔍 ${message}`);
    },

    step(index, total, description) {
      write(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
    },

    stepResult(index, total, success, description) {
      const icon = success ? '✅' : '❌';
      write(`${icon} [${String(index + 1)}/${String(total)}] ${description}`);
    },

    section(title) {
      write(`\n${'─'.repeat(50)}`);
      write(`▶  ${title}`);
      write(`${'─'.repeat(50)}`);
    },

    warn(message) {
      write(`⚠️  ${message}`);
    },

    error(message) {
      write(`💥 ${message}`);
    },
  };
}

/** Discards everything. Default for library callers that pass no logger. */
export const silentLogger: Logger = createLogger({ write: () => {} });
