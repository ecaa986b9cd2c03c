// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Backend Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { StorageConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';
import type { DocumentStorage } from './types.js';
import { FileDocumentStorage } from './file.js';
import { MemoryDocumentStorage } from './memory.js';
import { createRedisDocumentStorage } from './redis.js';

export type { DocumentStorage } from './types.js';
export { FileDocumentStorage } from './file.js';
export { MemoryDocumentStorage } from './memory.js';
export {
  RedisDocumentStorage,
  createRedisDocumentStorage,
  type RedisDocumentClient,
  type RedisStorageOptions,
} from './redis.js';

const logger = getLogger({ component: 'storage' });

export function createStorage(config: StorageConfig): DocumentStorage {
  switch (config.backend) {
    case 'redis':
      logger.info('Using Redis storage', { documentKey: config.redisDocumentKey });
      return createRedisDocumentStorage({
        url: config.redisUrl,
        key: config.redisDocumentKey,
        commandTimeoutMs: config.redisCommandTimeoutMs,
      });

    case 'memory':
      logger.warn('Using in-memory storage; profiles are lost on restart');
      return new MemoryDocumentStorage();

    case 'file':
      logger.info('Using file storage', { path: config.filePath });
      return new FileDocumentStorage(config.filePath);
  }
}
