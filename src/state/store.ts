/**
 * Processed-Episode Store
 *
 * An append-only log with one identifier per line, indexed in memory.
 * Lines are only ever appended, so host tooling tailing the file sees it
 * grow monotonically.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { StateStoreError, describeError, isNodeError } from '../errors';

export interface StoreInstance {
    load(): Promise<number>;
    isProcessed(identifier: string): boolean;
    markProcessed(identifier: string): Promise<void>;
    size(): number;
    readonly filePath: string;
}

export const create = (filePath: string): StoreInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const processed = new Set<string>();

    const load = async (): Promise<number> => {
        let content: string;
        try {
            content = await storage.readFile(filePath, 'utf8');
        } catch (error: unknown) {
            if (isNodeError(error, 'ENOENT')) {
                logger.info('State file %s not found, starting fresh', filePath);
                return 0;
            }
            throw new StateStoreError(filePath, `Could not read state file: ${describeError(error)}`, { cause: error });
        }

        for (const line of content.split('\n')) {
            const identifier = line.trim();
            if (identifier) {
                processed.add(identifier);
            }
        }
        logger.info('Loaded %d processed episode(s) from %s', processed.size, filePath);
        return processed.size;
    };

    const isProcessed = (identifier: string): boolean => processed.has(identifier);

    const markProcessed = async (identifier: string): Promise<void> => {
        if (processed.has(identifier)) {
            logger.debug('Episode %s already recorded as processed', identifier);
            return;
        }
        if (!identifier || /[\r\n]/.test(identifier)) {
            throw new StateStoreError(filePath, `Refusing to record malformed identifier "${identifier}"`);
        }

        try {
            await storage.createDirectory(path.dirname(filePath));
            await storage.appendDurably(filePath, `${identifier}\n`);
        } catch (error: unknown) {
            throw new StateStoreError(filePath, `Could not record episode ${identifier}: ${describeError(error)}`, { cause: error });
        }

        // Only claim "processed" once the line is durable
        processed.add(identifier);
        logger.debug('Recorded episode %s as processed', identifier);
    };

    return {
        load,
        isProcessed,
        markProcessed,
        size: () => processed.size,
        filePath,
    };
};
