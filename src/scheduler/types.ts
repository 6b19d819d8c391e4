import type { FeedSource } from '../feed';
import type { ImportSource } from '../importer';
import type { EpisodeProcessor } from '../processor';
import type { StateStore } from '../state';
import type { StagingPolicy } from '../types';

export interface SchedulerConfig {
    feeds: string[];
    feedSource: FeedSource;
    importSource?: ImportSource;
    processor: EpisodeProcessor;
    stateStore: StateStore;
    lookbackWindowMs: number;
    /** Sleep between passes */
    intervalMs: number;
    stagingPolicy: StagingPolicy;
    /** Run a single pass, then stop */
    once?: boolean;
    now?: () => Date;
}

export type SchedulerState = 'idle' | 'running' | 'sleeping' | 'stopped';

export interface PassSummary {
    selected: number;
    succeeded: number;
    failed: number;
    skipped: number;
    feedErrors: number;
}

export interface SchedulerStats {
    state: SchedulerState;
    passes: number;
    totalProcessed: number;
    lastPassTime?: string;
    currentTask?: string;
    startTime: number;
}
