import { describe, expect, test, vi } from 'vitest';
import { isWithinLookback, select } from '../../src/selection';
import { FeedCandidate, ImportCandidate } from '../../src/types';

vi.mock('../../src/logging', () => {
    const logger = { debug: vi.fn(), verbose: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return { getLogger: () => logger, setLogLevel: vi.fn() };
});

const NOW = new Date('2025-03-10T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;
const WEEK = 7 * DAY;

const feed = (identifier: string, publishedAt: Date | null, feedOrder = 0): FeedCandidate => ({
    sourceKind: 'feed',
    identifier,
    title: identifier,
    displayTitle: identifier,
    audioLocation: `https://cdn.test/${identifier}.mp3`,
    publishedAt,
    feedUrl: `https://feeds.test/${feedOrder}.xml`,
    feedOrder,
});

const upload = (identifier: string, staged = false): ImportCandidate => ({
    sourceKind: 'import',
    identifier,
    title: identifier,
    displayTitle: identifier,
    audioLocation: `/import/${identifier}.mp3`,
    publishedAt: null,
    modifiedAt: NOW,
    staged,
});

const nothingProcessed = { isProcessed: () => false };

const ids = (candidates: { identifier: string }[]): string[] => candidates.map(c => c.identifier);

describe('select', () => {
    test('includes an episode published exactly at the lookback boundary', () => {
        const boundary = new Date(NOW.getTime() - WEEK);
        const justBefore = new Date(boundary.getTime() - 1);

        const work = select({
            feedCandidates: [feed('at-boundary', boundary), feed('too-old', justBefore)],
            importCandidates: [],
            lookbackWindowMs: WEEK,
            stateStore: nothingProcessed,
            now: NOW,
        });

        expect(ids(work)).toEqual(['at-boundary']);
    });

    test('keeps feed episodes without a publish date, after dated ones', () => {
        const work = select({
            feedCandidates: [feed('undated', null), feed('recent', new Date(NOW.getTime() - DAY))],
            importCandidates: [],
            lookbackWindowMs: WEEK,
            stateStore: nothingProcessed,
            now: NOW,
        });

        expect(ids(work)).toEqual(['recent', 'undated']);
    });

    test('undated feed episodes are still dropped once processed', () => {
        const work = select({
            feedCandidates: [feed('undated', null)],
            importCandidates: [],
            lookbackWindowMs: WEEK,
            stateStore: { isProcessed: (identifier: string) => identifier === 'undated' },
            now: NOW,
        });

        expect(work).toEqual([]);
    });

    test('imports bypass the lookback window and come first', () => {
        const feeds = Array.from({ length: 10 }, (_, index) => feed(`feed-${index}`, new Date(NOW.getTime() - (index + 1) * 60_000)));

        const work = select({
            feedCandidates: feeds,
            importCandidates: [upload('import-1')],
            lookbackWindowMs: WEEK,
            stateStore: nothingProcessed,
            now: NOW,
        });

        expect(work).toHaveLength(11);
        expect(work[0]?.identifier).toBe('import-1');
    });

    test('orders feed episodes oldest first, then by feed order, then identifier', () => {
        const older = new Date(NOW.getTime() - 2 * DAY);
        const newer = new Date(NOW.getTime() - DAY);

        const work = select({
            feedCandidates: [
                feed('c', newer, 0),
                feed('b', older, 1),
                feed('z', older, 0),
                feed('a', older, 0),
            ],
            importCandidates: [],
            lookbackWindowMs: WEEK,
            stateStore: nothingProcessed,
            now: NOW,
        });

        expect(ids(work)).toEqual(['a', 'z', 'b', 'c']);
    });

    test('keeps import scan order but puts resumed staged files first', () => {
        const work = select({
            feedCandidates: [],
            importCandidates: [upload('first'), upload('second'), upload('resumed', true)],
            lookbackWindowMs: WEEK,
            stateStore: nothingProcessed,
            now: NOW,
        });

        expect(ids(work)).toEqual(['resumed', 'first', 'second']);
    });

    test('filters processed and duplicate candidates', () => {
        const published = new Date(NOW.getTime() - DAY);

        const work = select({
            feedCandidates: [feed('done', published), feed('dup', published, 0), feed('dup', published, 1), feed('new', published)],
            importCandidates: [upload('done-import')],
            lookbackWindowMs: WEEK,
            stateStore: { isProcessed: identifier => identifier.startsWith('done') },
            now: NOW,
        });

        expect(work.map(c => [c.identifier, c.sourceKind === 'feed' ? c.feedOrder : -1])).toEqual([['dup', 0], ['new', 0]]);
    });

    test('does not mutate its inputs', () => {
        const published = new Date(NOW.getTime() - DAY);
        const feeds = [feed('b', published), feed('a', published)];
        const imports = [upload('x'), upload('y', true)];

        select({ feedCandidates: feeds, importCandidates: imports, lookbackWindowMs: WEEK, stateStore: nothingProcessed, now: NOW });

        expect(ids(feeds)).toEqual(['b', 'a']);
        expect(ids(imports)).toEqual(['x', 'y']);
    });
});

describe('isWithinLookback', () => {
    test('compares against the cutoff inclusively', () => {
        expect(isWithinLookback(feed('a', NOW), NOW)).toBe(true);
        expect(isWithinLookback(feed('a', new Date(NOW.getTime() - 1)), NOW)).toBe(false);
    });

    test('treats undated episodes as inside the window', () => {
        expect(isWithinLookback(feed('a', null), NOW)).toBe(true);
    });
});
