/**
 * Feed Source
 *
 * Fetches one RSS feed and turns its entries into episode candidates.
 */

import axios, { AxiosInstance } from 'axios';
import Parser from 'rss-parser';
import * as Logging from '../logging';
import { FEED_TIMEOUT_MS } from '../constants';
import { FetchError, ParseError, describeError } from '../errors';
import { FeedCandidate } from '../types';
import { sanitizeFilename } from '../util/filename';
import { feedEpisodeIdentifier } from '../util/identifier';
import { extractAudioUrl, extractPublishedAt, extractStableKey, extractTitle } from './entry';

export interface SourceConfig {
    http?: AxiosInstance;
    timeoutMs?: number;
}

export interface SourceInstance {
    fetch(feedUrl: string, feedOrder: number): Promise<FeedCandidate[]>;
}

export const create = (config: SourceConfig = {}): SourceInstance => {
    const logger = Logging.getLogger();
    const http = config.http ?? axios.create();
    const parser: Parser<Record<string, unknown>, Record<string, unknown>> = new Parser();

    const download = async (feedUrl: string): Promise<string> => {
        try {
            const response = await http.get<string>(feedUrl, {
                responseType: 'text',
                timeout: config.timeoutMs ?? FEED_TIMEOUT_MS,
            });
            return response.data;
        } catch (error: unknown) {
            if (axios.isAxiosError(error) && error.response) {
                throw new FetchError(feedUrl, `Feed returned HTTP ${error.response.status}`, {
                    cause: error,
                    status: error.response.status,
                });
            }
            throw new FetchError(feedUrl, `Could not fetch feed: ${describeError(error)}`, { cause: error });
        }
    };

    const fetch = async (feedUrl: string, feedOrder: number): Promise<FeedCandidate[]> => {
        logger.info('Checking feed: %s', feedUrl);
        const body = await download(feedUrl);

        let items: Parser.Item[];
        try {
            items = (await parser.parseString(body)).items;
        } catch (error: unknown) {
            throw new ParseError(feedUrl, `Could not parse feed: ${describeError(error)}`, { cause: error });
        }

        const candidates: FeedCandidate[] = [];
        for (const entry of items) {
            const label = entry.title ?? entry.guid ?? entry.link ?? '(untitled)';

            const audioUrl = extractAudioUrl(entry);
            if (!audioUrl) {
                logger.warn('Entry "%s" in %s has no audio enclosure, skipping', label, feedUrl);
                continue;
            }

            const publishedAt = extractPublishedAt(entry);
            const stableKey = extractStableKey(entry, publishedAt);
            if (!stableKey) {
                logger.warn('Entry "%s" in %s has no GUID, link or dated title, skipping', label, feedUrl);
                continue;
            }

            const identifier = feedEpisodeIdentifier(feedUrl, stableKey);
            const displayTitle = extractTitle(entry, audioUrl, identifier);
            candidates.push({
                sourceKind: 'feed',
                identifier,
                title: sanitizeFilename(displayTitle),
                displayTitle,
                audioLocation: audioUrl,
                publishedAt,
                feedUrl,
                feedOrder,
            });
        }

        logger.verbose('Feed %s listed %d episode(s) with audio', feedUrl, candidates.length);
        return candidates;
    };

    return {
        fetch,
    };
};
