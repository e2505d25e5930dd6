export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let globalVerbose = process.env['LAYOUTKB_DEBUG'] === '1' || process.env['LAYOUTKB_DEBUG'] === 'true';
let silenced = process.env['LAYOUTKB_SILENT'] === '1';

/**
 * Toggle debug output for every scoped logger
 */
export function setVerbose(verbose: boolean): void {
  globalVerbose = verbose;
}

/**
 * Mute info/debug output (warnings and errors still print)
 */
export function setSilent(silent: boolean): void {
  silenced = silent;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (globalVerbose && !silenced) {
        console.log(`🔍 ${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      if (!silenced) {
        console.log(`${prefix} ${message}`, ...details);
      }
    },
    warn(message, ...details) {
      console.warn(`⚠️  ${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`❌ ${prefix} ${message}`, ...details);
    },
  };
}
