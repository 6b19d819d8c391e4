/**
 * Discord webhook notifier
 *
 * Posts a completion message with the transcript attached. Transcripts over
 * the attachment limit go out as a message with a short excerpt instead.
 */

import * as path from 'node:path';
import axios, { AxiosInstance } from 'axios';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { MAX_ATTACHMENT_BYTES, NOTIFICATION_EXCERPT_LENGTH, NOTIFICATION_TIMEOUT_MS } from '../constants';
import { describeError } from '../errors';
import { NotificationMessage, Notifier } from './types';

export interface DiscordConfig {
    webhookUrl: string;
    http?: AxiosInstance;
    timeoutMs?: number;
    maxAttachmentBytes?: number;
}

const toMegabytes = (bytes: number): string => (bytes / (1024 * 1024)).toFixed(2);

export const headline = (title: string): string => `Transcription complete for: **${title}**`;

export const create = (config: DiscordConfig): Notifier => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const http = config.http ?? axios.create();
    const timeout = config.timeoutMs ?? NOTIFICATION_TIMEOUT_MS;
    const maxAttachmentBytes = config.maxAttachmentBytes ?? MAX_ATTACHMENT_BYTES;

    const postWithAttachment = async (content: string, filename: string, transcript: string): Promise<void> => {
        const form = new FormData();
        form.append('payload_json', JSON.stringify({ content }));
        form.append('files[0]', new Blob([transcript], { type: 'text/plain' }), filename);
        await http.post(config.webhookUrl, form, { timeout });
    };

    const postExcerpt = async (content: string, filename: string, size: number, transcript: string): Promise<void> => {
        const excerpt = transcript.slice(0, NOTIFICATION_EXCERPT_LENGTH).trim();
        const body = `${content}\n(Transcript \`${filename}\` too large to attach: ${toMegabytes(size)}MB)\n\`\`\`\n${excerpt}\n\`\`\``;
        await http.post(config.webhookUrl, { content: body }, { timeout });
    };

    const notify = async ({ title, transcriptPath }: NotificationMessage): Promise<boolean> => {
        const filename = path.basename(transcriptPath);
        try {
            const size = await storage.getFileSize(transcriptPath);
            const transcript = await storage.readFile(transcriptPath, 'utf8');
            if (size > maxAttachmentBytes) {
                logger.warn('Transcript %s is %sMB, sending notification without attachment', filename, toMegabytes(size));
                await postExcerpt(headline(title), filename, size, transcript);
            } else {
                await postWithAttachment(headline(title), filename, transcript);
            }
        } catch (error: unknown) {
            if (axios.isAxiosError(error) && error.response) {
                logger.error('Discord rejected notification for %s with HTTP %d', filename, error.response.status);
                logger.debug('Discord response body: %j', error.response.data);
            } else {
                logger.error('Could not send notification for %s: %s', filename, describeError(error));
            }
            return false;
        }

        logger.info('Sent notification for %s to Discord', filename);
        return true;
    };

    return {
        enabled: true,
        notify,
    };
};
