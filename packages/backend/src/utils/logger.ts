import winston from 'winston';

const formatLine = winston.format.printf(({ timestamp, level, message, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  // Add metadata if present
  if (Object.keys(metadata).length > 0) {
    msg += ' ' + JSON.stringify(metadata);
  }

  return msg;
});

/**
 * Singleton Logger class using Winston.
 * Provides colorized, formatted logging; the level comes from LOG_LEVEL.
 */
class Logger {
  private static instance: winston.Logger;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  /**
   * Get the singleton logger instance
   */
  public static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.errors({ stack: true }),
          winston.format.splat()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize({ all: true }), formatLine),
          }),
        ],
      });
    }

    return Logger.instance;
  }
}

// Export the singleton instance
export const logger = Logger.getInstance();

/**
 * Masks a credential for logging, keeping only its edges.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 12) return '***';
  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}
