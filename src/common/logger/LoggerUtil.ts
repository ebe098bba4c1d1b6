import * as winston from "winston";

export class LoggerUtil {
  private static logger: winston.Logger | null = null;

  static getLogger(): winston.Logger {
    if (!this.logger) {
      const customFormat = winston.format.printf(
        ({ timestamp, level, message, context, user, error }) => {
          return JSON.stringify({
            timestamp: timestamp,
            context: context,
            user: user,
            level: level,
            message: message,
            error: error,
          });
        },
      );

      this.logger = winston.createLogger({
        level: process.env.LOG_LEVEL || "info",
        format: winston.format.combine(
          winston.format.timestamp(),
          customFormat,
        ),
        transports: [new winston.transports.Console()],
      });
    }
    return this.logger;
  }

  // Drops the cached logger so the next call picks up a changed LOG_LEVEL
  static resetLogger(): void {
    this.logger = null;
  }

  static log(
    message: string,
    context?: string,
    user?: string | number,
    level: string = "info",
  ): void {
    this.getLogger().log({
      level: level,
      message: message,
      context: context,
      user: user,
      timestamp: new Date().toISOString(),
    });
  }

  static error(
    message: string,
    error?: string,
    context?: string,
    user?: string | number,
  ): void {
    this.getLogger().error({
      message: message,
      error: error,
      context: context,
      user: user,
      timestamp: new Date().toISOString(),
    });
  }

  static warn(message: string, context?: string): void {
    this.getLogger().warn({
      message: message,
      context: context,
      timestamp: new Date().toISOString(),
    });
  }

  static debug(message: string, context?: string): void {
    this.getLogger().debug({
      message: message,
      context: context,
      timestamp: new Date().toISOString(),
    });
  }
}
