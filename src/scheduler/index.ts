import { Scheduler } from './scheduler';
import { SchedulerConfig } from './types';

export interface IntervalOptions {
    feedCount: number;
    importEnabled: boolean;
    checkIntervalSeconds: number;
    importCheckIntervalSeconds: number;
}

/** Import-only deployments poll on the shorter import interval. */
export const pollingIntervalMs = (options: IntervalOptions): number =>
    (options.feedCount === 0 && options.importEnabled
        ? options.importCheckIntervalSeconds
        : options.checkIntervalSeconds) * 1000;

export const create = (config: SchedulerConfig): Scheduler => new Scheduler(config);

export { Scheduler };
export type { PassSummary, SchedulerConfig, SchedulerState, SchedulerStats } from './types';
