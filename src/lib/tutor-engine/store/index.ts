/**
 * Path Store Factory
 * SQLite when a database path is configured, in-memory otherwise
 */

import type { PathStore } from './types';
import type { EngineConfig } from '../config';
import { MemoryPathStore } from './memory-store';
import { SqlitePathStore } from './sqlite-store';
import { createLogger } from '@/lib/debug';

const logger = createLogger('PathStore');

export function createPathStore(config: EngineConfig): PathStore {
    const { databasePath } = config.store;

    if (databasePath) {
        logger.info('Using SQLite store', { type: 'store', path: databasePath });
        return new SqlitePathStore(databasePath);
    }

    logger.info('Using in-memory store (no DATABASE_PATH)', { type: 'store' });
    return new MemoryPathStore();
}

export { MemoryPathStore } from './memory-store';
export { SqlitePathStore } from './sqlite-store';
export type { PathStore, PendingWrite } from './types';
