/**
 * Logger
 * Console logging with a global on/off switch.
 *
 * The stdio MCP entry point routes everything to stderr because stdout
 * carries protocol frames there.
 */

export type LoggingOptions = {
  enabled: boolean;
  stream: 'stdout' | 'stderr';
};

const options: LoggingOptions = {
  enabled: true,
  stream: 'stdout'
};

export function configureLogging(update: Partial<LoggingOptions>): void {
  Object.assign(options, update);
}

export function isLoggingEnabled(): boolean {
  return options.enabled;
}

export const logger = {
  info(message: string, ...details: unknown[]): void {
    if (!isLoggingEnabled()) return;
    if (options.stream === 'stderr') {
      console.error(message, ...details);
    } else {
      console.log(message, ...details);
    }
  },

  warn(message: string, ...details: unknown[]): void {
    if (!isLoggingEnabled()) return;
    if (options.stream === 'stderr') {
      console.error(message, ...details);
    } else {
      console.warn(message, ...details);
    }
  },

  // Errors are never silenced
  error(message: string, ...details: unknown[]): void {
    console.error(message, ...details);
  }
};
