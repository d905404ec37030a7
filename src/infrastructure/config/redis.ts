import { createClient } from 'redis';
import { errorMessage, Logger } from '../logger/Logger';

export type RedisClient = ReturnType<typeof createClient>;

const CONNECT_TIMEOUT_MS = 5000;

function describeUrl(url: string): string {
  return url.substring(0, 20) + '...';
}

/**
 * Owns one Redis client and connects it on first use
 * (serverless invocations may never touch the store).
 */
export class RedisConnection {
  readonly client: RedisClient;
  private connectionPromise: Promise<void> | null = null;

  constructor(private readonly redisUrl: string) {
    const isSSL = redisUrl.startsWith('rediss://');

    Logger.info('Initializing Redis client', {
      urlPrefix: describeUrl(redisUrl),
      isSSL,
    });

    this.client = createClient({
      url: redisUrl,
      socket: isSSL
        ? { connectTimeout: CONNECT_TIMEOUT_MS, reconnectStrategy: false, tls: true, rejectUnauthorized: false }
        : { connectTimeout: CONNECT_TIMEOUT_MS, reconnectStrategy: false },
      disableClientInfo: true,
    });

    this.client.on('error', (err: Error) => {
      Logger.error('Redis client error', {
        message: err.message,
        name: err.name,
      });
    });

    this.client.on('ready', () => {
      Logger.info('Redis: ready to accept commands');
    });
  }

  async getClient(): Promise<RedisClient> {
    await this.ensureConnected();
    return this.client;
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    this.connectionPromise = null;
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isReady) {
      return;
    }

    if (!this.connectionPromise) {
      this.connectionPromise = this.connect().catch(error => {
        this.connectionPromise = null;
        Logger.error('Redis: connection failed', {
          error: errorMessage(error),
          urlPrefix: describeUrl(this.redisUrl),
        });
        throw error;
      });
    }

    return this.connectionPromise;
  }

  private async connect(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Connection timeout after ${CONNECT_TIMEOUT_MS}ms`)), CONNECT_TIMEOUT_MS);
    });

    try {
      await Promise.race([this.client.connect(), timeout]);
      Logger.info('Redis: connection established');
    } finally {
      clearTimeout(timer);
    }
  }
}
