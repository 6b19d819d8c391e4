import crypto from 'node:crypto';

const hash = (parts: string[]): string =>
    crypto.createHash('sha256').update(parts.join('\n')).digest('hex');

export const feedEpisodeIdentifier = (feedUrl: string, stableKey: string): string =>
    hash([feedUrl, stableKey]);

export const importFileIdentifier = (basename: string, size: number, modifiedMs: number): string =>
    hash(['import', basename, size.toString(), Math.floor(modifiedMs).toString()]);

export const shortIdentifier = (identifier: string): string => identifier.slice(0, 8);
