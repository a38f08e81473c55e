// src/modules/redis/redis.service.ts
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { DependencyHealth } from '../../common/interfaces/health.interface';
import { errorMessage } from '../../common/utils/error.util';

const KEY_PREFIX = 'agro-knowledge:';
const TRANSIENT_ERRORS = ['EPIPE', 'ECONNRESET', 'ENOTCONN', 'ECONNREFUSED', 'ETIMEDOUT'];

/**
 * JSON cache on Redis. Every key is namespaced so the instance can be shared
 * with the other farm services.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private readonly client: Redis;
  private isConnected = false;
  private readonly host: string;
  private readonly port: number;

  constructor(private configService: ConfigService) {
    this.host = this.configService.get<string>('REDIS_HOST') || 'localhost';
    this.port = this.configService.get<number>('REDIS_PORT') || 6379;

    this.client = new Redis({
      host: this.host,
      port: this.port,
      password: this.configService.get<string>('REDIS_PASSWORD') || undefined,
      keyPrefix: KEY_PREFIX,
      retryStrategy: (times: number) => {
        if (times > 30) {
          this.logger.error('Redis max retries exceeded, giving up');
          return null;
        }
        return Math.min(times * 200, 5000);
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      connectTimeout: 10000,
      enableOfflineQueue: true,
    });

    this.client.on('ready', () => {
      this.isConnected = true;
      this.logger.log(`✅ Redis ready at ${this.host}:${this.port}`);
    });

    this.client.on('error', (error: Error & { code?: string }) => {
      const transient = TRANSIENT_ERRORS.some(
        (code) => error.code === code || error.message.includes(code),
      );
      if (!transient) {
        this.logger.error(`Redis error: ${error.message}`);
      } else if (this.isConnected) {
        this.logger.debug(`Redis transient error: ${error.code || error.message}`);
      }
    });

    this.client.on('end', () => {
      this.isConnected = false;
      this.logger.warn('Redis connection ended');
    });
  }

  async onModuleInit(): Promise<void> {
    await this.waitForConnection(10000);
  }

  private async waitForConnection(timeoutMs: number): Promise<void> {
    const startTime = Date.now();
    while (!this.isConnected && Date.now() - startTime < timeoutMs) {
      await new Promise((resolve) => setTimeout(resolve, 500));
    }
    if (!this.isConnected) {
      this.logger.warn('Redis connection timeout - cache calls will queue until it is reachable');
    }
  }

  /**
   * Store a JSON value, with a TTL in seconds when given
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    try {
      const serialized = JSON.stringify(value);
      if (ttlSeconds) {
        await this.client.setex(key, ttlSeconds, serialized);
      } else {
        await this.client.set(key, serialized);
      }
    } catch (error) {
      this.logger.error(`Failed to set key ${key}: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Read a JSON value; a miss or an unreachable Redis both read as null
   */
  async get<T>(key: string): Promise<T | null> {
    try {
      const value = await this.client.get(key);
      return value ? JSON.parse(value) : null;
    } catch (error) {
      this.logger.warn(`Failed to get key ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  async onModuleDestroy() {
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }

  /**
   * Health check for Redis connectivity
   */
  async isHealthy(): Promise<DependencyHealth> {
    const start = Date.now();
    try {
      await this.client.ping();
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, error: errorMessage(error) };
    }
  }
}
