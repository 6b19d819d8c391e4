import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { DownloadError, FetchError, StateStoreError } from '../../src/errors';
import * as Feed from '../../src/feed';
import type { FeedSource } from '../../src/feed';
import * as Importer from '../../src/importer';
import * as Processor from '../../src/processor';
import type { EpisodeProcessor } from '../../src/processor';
import * as Scheduler from '../../src/scheduler';
import * as State from '../../src/state';
import type { StateStore } from '../../src/state';
import type { TranscriptionEngine } from '../../src/transcription';
import type { EpisodeCandidate, FeedCandidate, ProcessingOutcome } from '../../src/types';
import { createStubHttp, routes } from '../support/http';

vi.mock('../../src/logging', () => {
    const logger = { debug: vi.fn(), verbose: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return { getLogger: () => logger, setLogLevel: vi.fn() };
});

const NOW = new Date('2025-01-10T00:00:00.000Z');
const WEEK = 7 * 24 * 60 * 60 * 1000;
const FEED_URL = 'https://feeds.test/show.xml';

const feedEpisode = (name: string, minutesAgo: number, feedOrder = 0): FeedCandidate => ({
    sourceKind: 'feed',
    identifier: `feed:${name}`,
    title: name,
    displayTitle: name,
    audioLocation: `https://cdn.test/${name}.mp3`,
    publishedAt: new Date(NOW.getTime() - minutesAgo * 60_000),
    feedUrl: FEED_URL,
    feedOrder,
});

const staticFeed = (episodes: FeedCandidate[]): FeedSource => ({
    fetch: vi.fn(async () => episodes),
});

// Records the order of work and marks successes in the store
const recordingProcessor = (
    stateStore: StateStore,
    order: string[],
    onProcess: (candidate: EpisodeCandidate) => Promise<ProcessingOutcome | void> = async () => undefined,
): EpisodeProcessor => ({
    sweep: vi.fn(async () => 0),
    process: vi.fn(async (candidate: EpisodeCandidate): Promise<ProcessingOutcome> => {
        order.push(candidate.displayTitle);
        const override = await onProcess(candidate);
        if (override) {
            return override;
        }
        await stateStore.markProcessed(candidate.identifier);
        return { status: 'success', identifier: candidate.identifier, transcriptPath: `/out/${candidate.title}.txt`, audioPath: null };
    }),
});

describe('Scheduler', () => {
    let tempDir: string;
    let importDir: string;
    let stateStore: StateStore;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scheduler-test-'));
        importDir = path.join(tempDir, 'import');
        await fs.mkdir(importDir);
        stateStore = await State.create(path.join(tempDir, 'out', '.processed_episodes.log'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    const schedulerConfig = (overrides: Partial<Scheduler.SchedulerConfig>): Scheduler.SchedulerConfig => ({
        feeds: [FEED_URL],
        feedSource: staticFeed([]),
        processor: recordingProcessor(stateStore, []),
        stateStore,
        lookbackWindowMs: WEEK,
        intervalMs: 60_000,
        stagingPolicy: 'resume',
        now: () => NOW,
        ...overrides,
    });

    test('a second pass with no new episodes downloads and transcribes nothing', async () => {
        const rss = `<?xml version="1.0"?><rss version="2.0"><channel><title>Show</title>
            <item><title>One</title><guid>1</guid><pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate><enclosure url="https://cdn.test/1.mp3" type="audio/mpeg"/></item>
            <item><title>Two</title><guid>2</guid><pubDate>Wed, 08 Jan 2025 10:00:00 GMT</pubDate><enclosure url="https://cdn.test/2.mp3" type="audio/mpeg"/></item>
            <item><title>Old</title><guid>0</guid><pubDate>Mon, 30 Dec 2024 10:00:00 GMT</pubDate><enclosure url="https://cdn.test/0.mp3" type="audio/mpeg"/></item>
        </channel></rss>`;
        const { http, requests } = createStubHttp(routes({
            [FEED_URL]: { body: rss },
            'https://cdn.test/1.mp3': { body: 'one' },
            'https://cdn.test/2.mp3': { body: 'two' },
        }));
        const engine: TranscriptionEngine = { name: 'faster-whisper', transcribe: vi.fn(async () => 'text\n') };
        const processor = Processor.create({
            outputDirectory: path.join(tempDir, 'out'),
            keepAudio: false,
            downloadTimeoutMs: 1000,
            downloadAttempts: 1,
            http,
            stateStore,
            engine,
            notifier: { enabled: false, notify: async () => false },
        });
        const scheduler = Scheduler.create(schedulerConfig({ feedSource: Feed.create({ http }), processor }));
        const audioRequests = (): number => requests.filter(request => request.url !== FEED_URL).length;

        const first = await scheduler.runPass();
        const second = await scheduler.runPass();

        expect(first).toEqual({ selected: 2, succeeded: 2, failed: 0, skipped: 0, feedErrors: 0 });
        expect(second).toEqual({ selected: 0, succeeded: 0, failed: 0, skipped: 0, feedErrors: 0 });
        expect(audioRequests()).toBe(2);
        expect(engine.transcribe).toHaveBeenCalledTimes(2);
        expect((await fs.readdir(path.join(tempDir, 'out', 'transcripts'))).sort()).toEqual(['One.txt', 'Two.txt']);
    });

    test('a failing feed does not stop the others', async () => {
        const feedSource: FeedSource = {
            fetch: vi.fn(async (feedUrl: string, feedOrder: number) => {
                if (feedUrl === 'https://feeds.test/broken.xml') {
                    throw new FetchError(feedUrl, 'Feed returned HTTP 500', { status: 500 });
                }
                return [feedEpisode('good', 10, feedOrder)];
            }),
        };
        const order: string[] = [];
        const scheduler = Scheduler.create(schedulerConfig({
            feeds: ['https://feeds.test/broken.xml', FEED_URL],
            feedSource,
            processor: recordingProcessor(stateStore, order),
        }));

        const summary = await scheduler.runPass();

        expect(summary).toEqual({ selected: 1, succeeded: 1, failed: 0, skipped: 0, feedErrors: 1 });
        expect(order).toEqual(['good']);
    });

    test('a pending import is processed before ten feed episodes', async () => {
        await fs.writeFile(path.join(importDir, 'request.mp3'), 'audio');
        const order: string[] = [];
        const episodes = Array.from({ length: 10 }, (_, index) => feedEpisode(`feed-${index}`, 100 - index));
        const scheduler = Scheduler.create(schedulerConfig({
            feedSource: staticFeed(episodes),
            importSource: Importer.create({ importDirectory: importDir }),
            processor: recordingProcessor(stateStore, order),
        }));

        const summary = await scheduler.runPass();

        expect(order[0]).toBe('request');
        expect(order).toHaveLength(11);
        expect(summary.selected).toBe(11);
    });

    test('imports arriving during feed work run before the next feed episode', async () => {
        const order: string[] = [];
        const processor = recordingProcessor(stateStore, order, async (candidate) => {
            if (candidate.displayTitle === 'feed-a') {
                await fs.writeFile(path.join(importDir, 'urgent.mp3'), 'audio');
            }
        });
        const scheduler = Scheduler.create(schedulerConfig({
            feedSource: staticFeed([feedEpisode('feed-a', 20), feedEpisode('feed-b', 10)]),
            importSource: Importer.create({ importDirectory: importDir }),
            processor,
        }));

        const summary = await scheduler.runPass();

        expect(order).toEqual(['feed-a', 'urgent', 'feed-b']);
        expect(summary).toEqual({ selected: 3, succeeded: 3, failed: 0, skipped: 0, feedErrors: 0 });
    });

    test('a failed episode is selected again on the next pass', async () => {
        const order: string[] = [];
        let attempts = 0;
        const processor = recordingProcessor(stateStore, order, async (candidate) => {
            attempts++;
            return attempts === 1
                ? { status: 'failed', identifier: candidate.identifier, error: new DownloadError(candidate.audioLocation, 'Server returned HTTP 503') }
                : undefined;
        });
        const scheduler = Scheduler.create(schedulerConfig({ feedSource: staticFeed([feedEpisode('flaky', 5)]), processor }));

        const first = await scheduler.runPass();
        const second = await scheduler.runPass();
        const third = await scheduler.runPass();

        expect(first).toMatchObject({ selected: 1, failed: 1 });
        expect(second).toMatchObject({ selected: 1, succeeded: 1 });
        expect(third.selected).toBe(0);
        expect(stateStore.isProcessed('feed:flaky')).toBe(true);
    });

    test('passes never overlap', async () => {
        let release: () => void = () => undefined;
        const blocked = new Promise<void>(resolve => {
            release = resolve;
        });
        const processor = recordingProcessor(stateStore, [], async () => {
            await blocked;
        });
        const scheduler = Scheduler.create(schedulerConfig({ feedSource: staticFeed([feedEpisode('slow', 5)]), processor }));

        const running = scheduler.runPass();
        await vi.waitFor(() => expect(processor.process).toHaveBeenCalled());

        await expect(scheduler.runPass()).rejects.toThrow('A pass is already running');
        release();
        expect((await running).succeeded).toBe(1);
    });

    test('once mode recovers, runs a single pass and stops', async () => {
        const stagingDir = path.join(importDir, '.processing_tmp');
        await fs.mkdir(stagingDir);
        await fs.writeFile(path.join(stagingDir, 'interrupted.mp3'), 'audio');
        const order: string[] = [];
        const processor = recordingProcessor(stateStore, order);
        const scheduler = Scheduler.create(schedulerConfig({
            feeds: [],
            importSource: Importer.create({ importDirectory: importDir }),
            processor,
            once: true,
        }));

        await scheduler.start();

        expect(processor.sweep).toHaveBeenCalledTimes(1);
        expect(order).toEqual(['interrupted']);
        expect(scheduler.getState()).toBe('stopped');
        expect(scheduler.getStats()).toMatchObject({ passes: 1, totalProcessed: 1, state: 'stopped' });
    });

    test('stop interrupts the sleep between passes', async () => {
        const scheduler = Scheduler.create(schedulerConfig({ intervalMs: 60 * 60 * 1000 }));

        const running = scheduler.start();
        await vi.waitFor(() => expect(scheduler.getState()).toBe('sleeping'));
        await scheduler.stop();

        await expect(running).resolves.toBeUndefined();
        expect(scheduler.getStats().passes).toBe(1);
        expect(scheduler.getState()).toBe('stopped');
    });

    test('state store failures stop the scheduler', async () => {
        const processor = recordingProcessor(stateStore, [], async () => {
            throw new StateStoreError('/out/.processed_episodes.log', 'disk full');
        });
        const scheduler = Scheduler.create(schedulerConfig({ feedSource: staticFeed([feedEpisode('any', 5)]), processor }));

        await expect(scheduler.start()).rejects.toBeInstanceOf(StateStoreError);
        expect(scheduler.getState()).toBe('stopped');
    });
});

describe('pollingIntervalMs', () => {
    test('uses the check interval when feeds are configured', () => {
        expect(Scheduler.pollingIntervalMs({ feedCount: 2, importEnabled: true, checkIntervalSeconds: 3600, importCheckIntervalSeconds: 60 })).toBe(3_600_000);
    });

    test('uses the import interval for import-only setups', () => {
        expect(Scheduler.pollingIntervalMs({ feedCount: 0, importEnabled: true, checkIntervalSeconds: 3600, importCheckIntervalSeconds: 60 })).toBe(60_000);
    });
});
