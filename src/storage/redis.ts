// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORAGE — Memory Document Under a Single Redis Key
// ═══════════════════════════════════════════════════════════════════════════════
//
// SET replaces the whole value atomically, so readers never observe a partial
// document.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import type { DocumentStorage } from './types.js';

/**
 * The slice of the ioredis client this backend needs.
 */
export interface RedisDocumentClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export interface RedisStorageOptions {
  url: string;
  key: string;

  /** Per-command timeout; commands fail instead of hanging */
  commandTimeoutMs: number;
}

export class RedisDocumentStorage implements DocumentStorage {
  readonly name = 'redis';

  private readonly client: RedisDocumentClient;
  private readonly key: string;

  constructor(client: RedisDocumentClient, key: string) {
    this.client = client;
    this.key = key;
  }

  async read(): Promise<string | null> {
    return this.client.get(this.key);
  }

  async write(contents: string): Promise<void> {
    await this.client.set(this.key, contents);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

export function createRedisDocumentStorage(options: RedisStorageOptions): RedisDocumentStorage {
  const client = new Redis(options.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 2,
    commandTimeout: options.commandTimeoutMs,
  });
  return new RedisDocumentStorage(client, options.key);
}
