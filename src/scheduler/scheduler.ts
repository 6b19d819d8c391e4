/**
 * Scheduler
 *
 * Runs discovery and processing passes one after another with a sleep in
 * between. Episodes within a pass are processed strictly one at a time.
 * After each feed episode the import folder is checked again so operator
 * imports never wait for the rest of a feed backlog.
 */

import * as Logging from '../logging';
import { describeError, FetchError, ParseError } from '../errors';
import { select } from '../selection';
import { EpisodeCandidate, FeedCandidate, ImportCandidate } from '../types';
import { shortIdentifier } from '../util/identifier';
import { PassSummary, SchedulerConfig, SchedulerState, SchedulerStats } from './types';

export class Scheduler {
    private readonly config: SchedulerConfig;
    private readonly logger = Logging.getLogger();
    private state: SchedulerState = 'idle';
    private stopRequested = false;
    private loop: Promise<void> | null = null;
    private activePass: Promise<PassSummary> | null = null;
    private wake: (() => void) | null = null;
    // Staged imports resumed at start-up, offered until attempted
    private resumed: ImportCandidate[] = [];
    private stats: Omit<SchedulerStats, 'state'>;

    constructor(config: SchedulerConfig) {
        this.config = config;
        this.stats = {
            passes: 0,
            totalProcessed: 0,
            startTime: Date.now(),
        };
    }

    /**
     * Recovers from an earlier run, then loops until stopped. Rejects when a
     * pass hits a fatal error.
     */
    start(): Promise<void> {
        if (this.loop) {
            return this.loop;
        }
        this.stats.startTime = Date.now();
        this.loop = this.run();
        return this.loop;
    }

    /**
     * Ends the loop after the episode in flight, interrupting any sleep.
     */
    async stop(): Promise<void> {
        if (this.stopRequested) {
            return;
        }
        this.logger.info('Stopping scheduler...');
        this.stopRequested = true;
        this.wake?.();
        if (this.loop) {
            await Promise.allSettled([this.loop]);
        }
        this.state = 'stopped';
        this.logger.info('Scheduler stopped');
    }

    getState(): SchedulerState {
        return this.state;
    }

    getStats(): SchedulerStats {
        return { ...this.stats, state: this.state };
    }

    async recover(): Promise<void> {
        await this.config.processor.sweep();
        if (this.config.importSource) {
            this.resumed = await this.config.importSource.recover(
                this.config.stagingPolicy,
                identifier => this.config.stateStore.isProcessed(identifier),
            );
        }
    }

    async runPass(): Promise<PassSummary> {
        if (this.activePass) {
            throw new Error('A pass is already running');
        }
        this.activePass = this.executePass();
        try {
            return await this.activePass;
        } finally {
            this.activePass = null;
        }
    }

    private async run(): Promise<void> {
        try {
            await this.recover();
            while (!this.stopRequested) {
                await this.runPass();
                if (this.config.once || this.stopRequested) {
                    break;
                }
                this.logger.info('Next check in %d second(s)', Math.round(this.config.intervalMs / 1000));
                await this.sleep(this.config.intervalMs);
            }
        } finally {
            this.state = 'stopped';
        }
    }

    private sleep(ms: number): Promise<void> {
        this.state = 'sleeping';
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }

    private async executePass(): Promise<PassSummary> {
        this.state = 'running';
        const summary: PassSummary = { selected: 0, succeeded: 0, failed: 0, skipped: 0, feedErrors: 0 };
        const attempted = new Set<string>();

        this.logger.info('Starting check pass');
        const feedCandidates = await this.fetchFeeds(summary);
        const work = select({
            feedCandidates,
            importCandidates: await this.scanImports(),
            lookbackWindowMs: this.config.lookbackWindowMs,
            stateStore: this.config.stateStore,
            now: this.config.now?.(),
        });
        summary.selected = work.length;
        this.logger.info('Selected %d episode(s) for processing', work.length);

        for (const candidate of work) {
            if (this.stopRequested) {
                break;
            }
            if (attempted.has(candidate.identifier)) {
                continue;
            }
            await this.processCandidate(candidate, summary, attempted);
            if (candidate.sourceKind === 'feed') {
                await this.processNewImports(summary, attempted);
            }
        }

        this.resumed = this.resumed.filter(candidate => !attempted.has(candidate.identifier));
        this.stats.passes++;
        this.stats.lastPassTime = new Date().toISOString();
        this.logger.info('Pass complete: %d selected, %d succeeded, %d failed, %d skipped, %d feed error(s)',
            summary.selected, summary.succeeded, summary.failed, summary.skipped, summary.feedErrors);
        return summary;
    }

    private async fetchFeeds(summary: PassSummary): Promise<FeedCandidate[]> {
        const candidates: FeedCandidate[] = [];
        for (const [feedOrder, feedUrl] of this.config.feeds.entries()) {
            try {
                candidates.push(...await this.config.feedSource.fetch(feedUrl, feedOrder));
            } catch (error: unknown) {
                summary.feedErrors++;
                if (error instanceof FetchError || error instanceof ParseError) {
                    this.logger.error('Skipping feed %s this pass: %s', feedUrl, error.message);
                } else {
                    this.logger.error('Unexpected error reading feed %s: %s', feedUrl, describeError(error));
                }
            }
        }
        return candidates;
    }

    private async scanImports(): Promise<ImportCandidate[]> {
        if (!this.config.importSource) {
            return [];
        }
        try {
            return [...this.resumed, ...await this.config.importSource.scan()];
        } catch (error: unknown) {
            this.logger.error('Could not scan import folder: %s', describeError(error));
            return [...this.resumed];
        }
    }

    // Imports that arrived while a feed episode was running go next
    private async processNewImports(summary: PassSummary, attempted: Set<string>): Promise<void> {
        if (!this.config.importSource) {
            return;
        }
        const arrivals = select({
            feedCandidates: [],
            importCandidates: await this.scanImports(),
            lookbackWindowMs: this.config.lookbackWindowMs,
            stateStore: this.config.stateStore,
        }).filter(candidate => !attempted.has(candidate.identifier));

        if (arrivals.length > 0) {
            this.logger.info('Found %d new import(s), processing before the next feed episode', arrivals.length);
        }
        for (const candidate of arrivals) {
            if (this.stopRequested) {
                return;
            }
            summary.selected++;
            await this.processCandidate(candidate, summary, attempted);
        }
    }

    private async processCandidate(candidate: EpisodeCandidate, summary: PassSummary, attempted: Set<string>): Promise<void> {
        attempted.add(candidate.identifier);
        this.stats.currentTask = `Processing ${candidate.displayTitle}`;
        try {
            const outcome = await this.config.processor.process(candidate);
            switch (outcome.status) {
                case 'success':
                    summary.succeeded++;
                    this.stats.totalProcessed++;
                    break;
                case 'failed':
                    summary.failed++;
                    this.logger.warn('Episode %s failed (%s) and will be retried next pass', shortIdentifier(candidate.identifier), outcome.error.name);
                    break;
                case 'skipped':
                    summary.skipped++;
                    this.logger.verbose('Episode %s skipped: %s', shortIdentifier(candidate.identifier), outcome.reason);
                    break;
            }
        } finally {
            this.stats.currentTask = undefined;
        }
    }
}
