export type LogMetadata = Record<string, unknown>;

export class Logger {
  private static formatMessage(level: string, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const metadataStr = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${timestamp}] [${level}] ${message}${metadataStr}`;
  }

  static info(message: string, metadata?: LogMetadata): void {
    console.log(this.formatMessage('INFO', message, metadata));
  }

  static error(message: string, metadata?: LogMetadata): void {
    console.error(this.formatMessage('ERROR', message, metadata));
  }

  static warn(message: string, metadata?: LogMetadata): void {
    console.warn(this.formatMessage('WARN', message, metadata));
  }

  static debug(message: string, metadata?: LogMetadata): void {
    if (process.env.NODE_ENV === 'development') {
      console.debug(this.formatMessage('DEBUG', message, metadata));
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
