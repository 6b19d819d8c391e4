/**
 * Audio download
 *
 * Streams a remote file into `<destination>.part` and renames it into place
 * once the transfer is complete. Transient failures are retried in place
 * with a linear back-off.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import axios, { AxiosInstance } from 'axios';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { DEFAULT_AUDIO_EXTENSION, DOWNLOAD_RETRY_DELAY_MS, PARTIAL_DOWNLOAD_SUFFIX, SUPPORTED_AUDIO_EXTENSIONS } from '../constants';
import { DownloadError, describeError } from '../errors';

export interface DownloadConfig {
    http?: AxiosInstance;
    timeoutMs: number;
    /** Total attempts, including the first */
    attempts: number;
    retryDelayMs?: number;
}

export interface DownloaderInstance {
    download(url: string, destination: string): Promise<number>;
}

/**
 * Extension for a downloaded file, taken from the URL path when it names a
 * known audio type.
 */
export const audioExtension = (url: string): string => {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        return DEFAULT_AUDIO_EXTENSION;
    }
    const extension = path.extname(pathname).toLowerCase();
    return SUPPORTED_AUDIO_EXTENSIONS.includes(extension) ? extension : DEFAULT_AUDIO_EXTENSION;
};

const contentLength = (value: unknown): number | null => {
    const parsed = typeof value === 'string' || typeof value === 'number' ? Number(value) : Number.NaN;
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
};

const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

const classify = (url: string, error: unknown): DownloadError => {
    if (error instanceof DownloadError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const status = error.response.status;
            return new DownloadError(url, `Server returned HTTP ${status}`, { cause: error, retryable: isRetryableStatus(status) });
        }
        return new DownloadError(url, `Network error: ${error.message}`, { cause: error, retryable: true });
    }
    // Stream failures mid-transfer
    return new DownloadError(url, `Transfer failed: ${describeError(error)}`, { cause: error, retryable: true });
};

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const create = (config: DownloadConfig): DownloaderInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const http = config.http ?? axios.create();
    const attempts = Math.max(1, config.attempts);
    const retryDelayMs = config.retryDelayMs ?? DOWNLOAD_RETRY_DELAY_MS;

    const transfer = async (url: string, partialPath: string): Promise<number> => {
        const response = await http.get<Readable>(url, {
            responseType: 'stream',
            timeout: config.timeoutMs,
            headers: { 'Accept-Encoding': 'identity' },
        });

        await pipeline(response.data, fs.createWriteStream(partialPath));

        const received = await storage.getFileSize(partialPath);
        const expected = contentLength(response.headers['content-length']);
        if (expected !== null && received < expected) {
            throw new DownloadError(url, `Truncated transfer: received ${received} of ${expected} bytes`, { retryable: true });
        }
        return received;
    };

    const download = async (url: string, destination: string): Promise<number> => {
        const partialPath = `${destination}${PARTIAL_DOWNLOAD_SUFFIX}`;

        for (let attempt = 1; ; attempt++) {
            try {
                logger.info('Downloading %s (attempt %d of %d)', url, attempt, attempts);
                const bytes = await transfer(url, partialPath);
                await storage.moveFile(partialPath, destination);
                logger.info('Downloaded %d bytes to %s', bytes, path.basename(destination));
                return bytes;
            } catch (error: unknown) {
                const failure = classify(url, error);
                try {
                    await storage.deleteFile(partialPath);
                } catch (cleanupError: unknown) {
                    logger.warn('Could not remove partial download %s: %s', partialPath, describeError(cleanupError));
                }
                if (!failure.retryable || attempt >= attempts) {
                    logger.error('Download of %s failed: %s', url, failure.message);
                    throw failure;
                }
                const wait = retryDelayMs * attempt;
                logger.warn('Download of %s failed (%s), retrying in %dms', url, failure.message, wait);
                await delay(wait);
            }
        }
    };

    return {
        download,
    };
};
