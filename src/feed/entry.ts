/**
 * Utilities for extracting episode data from parsed RSS items
 */

import * as path from 'node:path';
import { SUPPORTED_AUDIO_EXTENSIONS } from '../constants';

export interface FeedEntry {
    guid?: string;
    link?: string;
    title?: string;
    isoDate?: string;
    pubDate?: string;
    enclosure?: {
        url: string;
        type?: string;
    };
}

const hasAudioExtension = (location: string): boolean => {
    let pathname = location;
    try {
        pathname = new URL(location).pathname;
    } catch {
        // Not an absolute URL, match on the raw value
    }
    const extension = path.extname(pathname).toLowerCase();
    return SUPPORTED_AUDIO_EXTENSIONS.includes(extension);
};

/**
 * Audio URL from the enclosure, or from the link when it points at an audio file
 */
export const extractAudioUrl = (entry: FeedEntry): string | null => {
    const enclosure = entry.enclosure;
    if (enclosure?.url) {
        const type = enclosure.type?.trim() ?? '';
        if (type === '' || type.toLowerCase().startsWith('audio')) {
            return enclosure.url;
        }
    }
    if (entry.link && hasAudioExtension(entry.link)) {
        return entry.link;
    }
    return null;
};

export const extractPublishedAt = (entry: FeedEntry): Date | null => {
    for (const value of [entry.isoDate, entry.pubDate]) {
        if (value) {
            const parsed = new Date(value);
            if (!Number.isNaN(parsed.getTime())) {
                return parsed;
            }
        }
    }
    return null;
};

/**
 * GUID first, then link, then title plus publish time
 */
export const extractStableKey = (entry: FeedEntry, publishedAt: Date | null): string | null => {
    const guid = entry.guid?.trim();
    if (guid) {
        return guid;
    }
    const link = entry.link?.trim();
    if (link) {
        return link;
    }
    const title = entry.title?.trim();
    if (title && publishedAt) {
        return `${title}|${publishedAt.toISOString()}`;
    }
    return null;
};

export const extractTitle = (entry: FeedEntry, audioUrl: string, identifier: string): string => {
    const title = entry.title?.trim();
    if (title) {
        return title;
    }
    let pathname = audioUrl;
    try {
        pathname = new URL(audioUrl).pathname;
    } catch {
        // Keep the raw value
    }
    const stem = path.basename(pathname, path.extname(pathname));
    return stem || `episode_${identifier.slice(0, 8)}`;
};
