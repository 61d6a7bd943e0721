import { createClient } from "redis";
import { config } from "../config";

export interface RedisOptions {
  host: string;
  port: number;
}

/**
 * Redis client wrapper for the geolocation store.
 */
export class RedisClient {
  // Class property for singleton instance
  private static instance: RedisClient | null = null;

  public client: ReturnType<typeof createClient>;
  private connected: boolean = false;
  private connecting: boolean = false;

  constructor(
    options: RedisOptions = { host: config.redisHost, port: config.redisPort }
  ) {
    this.client = createClient({
      url: `redis://${options.host}:${options.port}`,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            return new Error("Max reconnection attempts reached");
          }
          return Math.min(Math.pow(2, retries) * 100, 3000);
        },
      },
    });

    // Set up event handlers
    this.client.on("connect", () => {
      this.connected = true;
    });

    this.client.on("error", (err) => {
      console.error("Redis error:", err);
      this.connected = false;
    });

    this.client.on("end", () => {
      this.connected = false;
    });
  }

  /**
   * Get or create the singleton instance
   */
  public static getInstance(): RedisClient {
    if (!RedisClient.instance) {
      RedisClient.instance = new RedisClient();
    }
    return RedisClient.instance;
  }

  /**
   * Check if client is connected
   */
  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Ensure Redis connection is established
   */
  public async ensureConnection(): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    if (this.connecting) {
      while (this.connecting) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      return;
    }

    try {
      this.connecting = true;
      await this.client.connect();
      this.connected = true;
    } catch (error) {
      console.error("Failed to connect to Redis:", error);
      throw error;
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Disconnect from Redis
   */
  public async disconnect(): Promise<void> {
    if (!this.isConnected()) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      console.error("Redis quit failed, forcing disconnect:", error);
      await this.client.disconnect();
    } finally {
      this.connected = false;
    }
  }

  // Helper methods
  public async hSetAll(
    key: string,
    values: Record<string, string | number>
  ): Promise<number> {
    await this.ensureConnection();
    return this.client.hSet(key, values);
  }

  public async hGetAll(key: string): Promise<Record<string, string>> {
    await this.ensureConnection();
    return this.client.hGetAll(key);
  }

  public async del(keys: string[]): Promise<number> {
    await this.ensureConnection();
    return keys.length > 0 ? this.client.del(keys) : 0;
  }

  /**
   * Collect every key matching a pattern with SCAN
   */
  public async scanKeys(pattern: string): Promise<string[]> {
    await this.ensureConnection();

    let keys: string[] = [];
    let cursor = 0;
    do {
      const result = await this.client.scan(cursor, {
        MATCH: pattern,
        COUNT: 1000,
      });

      cursor = result.cursor;
      keys = keys.concat(result.keys);
    } while (cursor !== 0);

    return keys;
  }
}

// Export singleton instance using getInstance pattern
export const redisClient = RedisClient.getInstance();
