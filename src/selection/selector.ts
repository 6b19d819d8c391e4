/**
 * Candidate Selector
 *
 * Merges feed and import candidates into the ordered work list for one pass.
 * Imports always come first: they are explicit operator requests and must
 * not wait behind a feed backlog. The lookback window bounds that backlog
 * after downtime. Feed entries without a usable publish date cannot be
 * placed in the window and are let through with a warning.
 */

import * as Logging from '../logging';
import { EpisodeCandidate, FeedCandidate, ImportCandidate } from '../types';

export interface ProcessedLookup {
    isProcessed(identifier: string): boolean;
}

export interface SelectInput {
    feedCandidates: FeedCandidate[];
    importCandidates: ImportCandidate[];
    lookbackWindowMs: number;
    stateStore: ProcessedLookup;
    now?: Date;
}

// Undated entries sort after every dated one
const publishedOrder = (candidate: FeedCandidate): number =>
    candidate.publishedAt?.getTime() ?? Number.POSITIVE_INFINITY;

const compareFeedCandidates = (a: FeedCandidate, b: FeedCandidate): number => {
    const left = publishedOrder(a);
    const right = publishedOrder(b);
    if (left !== right) {
        return left < right ? -1 : 1;
    }
    if (a.feedOrder !== b.feedOrder) {
        return a.feedOrder - b.feedOrder;
    }
    return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
};

export const isWithinLookback = (candidate: FeedCandidate, cutoff: Date): boolean =>
    candidate.publishedAt === null || candidate.publishedAt.getTime() >= cutoff.getTime();

export const select = (input: SelectInput): EpisodeCandidate[] => {
    const logger = Logging.getLogger();
    const now = input.now ?? new Date();
    const cutoff = new Date(now.getTime() - input.lookbackWindowMs);
    const seen = new Set<string>();

    const isFresh = (candidate: EpisodeCandidate): boolean => {
        if (input.stateStore.isProcessed(candidate.identifier)) {
            logger.debug('"%s" (%s) already processed, skipping', candidate.displayTitle, candidate.identifier);
            return false;
        }
        if (seen.has(candidate.identifier)) {
            logger.debug('"%s" (%s) listed twice, keeping the first', candidate.displayTitle, candidate.identifier);
            return false;
        }
        seen.add(candidate.identifier);
        return true;
    };

    // Resumed staging residue goes ahead of newly scanned files; sort is stable
    const imports = [...input.importCandidates]
        .sort((a, b) => Number(b.staged) - Number(a.staged))
        .filter(isFresh);

    const feeds = input.feedCandidates
        .filter(candidate => {
            if (candidate.publishedAt === null) {
                if (!input.stateStore.isProcessed(candidate.identifier)) {
                    logger.warn('"%s" in %s has no publication date, processing it regardless of the lookback window', candidate.displayTitle, candidate.feedUrl);
                }
                return true;
            }
            if (isWithinLookback(candidate, cutoff)) {
                return true;
            }
            logger.debug('"%s" published %s is before %s, skipping', candidate.displayTitle, candidate.publishedAt.toISOString(), cutoff.toISOString());
            return false;
        })
        .sort(compareFeedCandidates)
        .filter(isFresh);

    return [...imports, ...feeds];
};
