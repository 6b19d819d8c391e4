/**
 * Episode Processor
 *
 * Takes one candidate through acquire, transcribe, emit, retain, notify and
 * commit. Only a state store failure escapes `process`; every other failure
 * becomes a `failed` outcome and leaves the episode unmarked so the next pass
 * picks it up again.
 */

import * as path from 'node:path';
import { AxiosInstance } from 'axios';
import * as Logging from '../logging';
import * as Download from './download';
import * as Output from './output';
import type { ImportSource } from '../importer';
import type { Notifier } from '../notification';
import type { StateStore } from '../state';
import type { TranscriptionEngine } from '../transcription';
import { DownloadError, EpisodeError, TranscriptionError, UnknownError, describeError } from '../errors';
import { EpisodeCandidate, ImportCandidate, ProcessingOutcome } from '../types';
import { shortIdentifier } from '../util/identifier';

export interface ProcessorConfig {
    outputDirectory: string;
    keepAudio: boolean;
    downloadTimeoutMs: number;
    downloadAttempts: number;
    retryDelayMs?: number;
    http?: AxiosInstance;
    stateStore: StateStore;
    engine: TranscriptionEngine;
    notifier: Notifier;
    importSource?: ImportSource;
}

export interface ProcessorInstance {
    process(candidate: EpisodeCandidate): Promise<ProcessingOutcome>;
    sweep(): Promise<number>;
}

/** Vanished import files end the attempt without an error */
class ImportVanished extends Error {}

const toEpisodeError = (error: unknown): EpisodeError => {
    if (error instanceof DownloadError || error instanceof TranscriptionError || error instanceof UnknownError) {
        return error;
    }
    return new UnknownError(describeError(error), { cause: error });
};

export const create = (config: ProcessorConfig): ProcessorInstance => {
    const logger = Logging.getLogger();
    const output = Output.create({ outputDirectory: config.outputDirectory });
    const downloader = Download.create({
        http: config.http,
        timeoutMs: config.downloadTimeoutMs,
        attempts: config.downloadAttempts,
        retryDelayMs: config.retryDelayMs,
    });

    // A claimed import is processed where it sits in staging, so a crash leaves it to the staging policy
    const acquireImport = async (candidate: ImportCandidate): Promise<string> => {
        if (!config.importSource) {
            throw new UnknownError(`No import folder configured for ${candidate.audioLocation}`);
        }
        const stagedPath = await config.importSource.claim(candidate);
        if (!stagedPath) {
            throw new ImportVanished();
        }
        return stagedPath;
    };

    const acquire = async (candidate: EpisodeCandidate): Promise<string> => {
        if (candidate.sourceKind === 'import') {
            return await acquireImport(candidate);
        }
        const workingPath = output.workingAudioPath(candidate.title, Download.audioExtension(candidate.audioLocation));
        await downloader.download(candidate.audioLocation, workingPath);
        return workingPath;
    };

    // Puts an import back where a later scan will find it; drops a downloaded file
    const cleanUp = async (candidate: EpisodeCandidate, workingPath: string | null): Promise<void> => {
        if (!workingPath) {
            return;
        }
        try {
            if (candidate.sourceKind === 'import' && config.importSource) {
                await config.importSource.release(workingPath, path.basename(candidate.audioLocation));
            } else {
                await output.discardAudio(workingPath);
            }
        } catch (error: unknown) {
            logger.error('Cleanup after failed episode "%s" did not complete: %s', candidate.displayTitle, describeError(error));
        }
    };

    const applyRetention = async (candidate: EpisodeCandidate, workingPath: string): Promise<string | null> => {
        try {
            if (config.keepAudio) {
                return await output.retainAudio(candidate.identifier, workingPath, candidate.title);
            }
            await output.discardAudio(workingPath);
        } catch (error: unknown) {
            logger.warn('Audio retention step failed for %s: %s', workingPath, describeError(error));
        }
        return null;
    };

    const notify = async (candidate: EpisodeCandidate, transcriptPath: string): Promise<void> => {
        try {
            await config.notifier.notify({ title: candidate.displayTitle, transcriptPath });
        } catch (error: unknown) {
            logger.warn('Notification for "%s" failed: %s', candidate.displayTitle, describeError(error));
        }
    };

    const processEpisode = async (candidate: EpisodeCandidate): Promise<ProcessingOutcome> => {
        const { identifier } = candidate;
        if (config.stateStore.isProcessed(identifier)) {
            logger.debug('Episode %s already processed, skipping', shortIdentifier(identifier));
            return { status: 'skipped', identifier, reason: 'already processed' };
        }

        logger.info('Processing %s episode "%s" [%s]', candidate.sourceKind, candidate.displayTitle, shortIdentifier(identifier));
        let workingPath: string | null = null;
        let transcriptPath: string;
        try {
            await output.ensureDirectories();
            workingPath = await acquire(candidate);
            const transcript = await config.engine.transcribe(workingPath);
            transcriptPath = await output.writeTranscript(identifier, candidate.title, transcript);
        } catch (error: unknown) {
            if (error instanceof ImportVanished) {
                return { status: 'skipped', identifier, reason: 'import file vanished' };
            }
            const failure = toEpisodeError(error);
            if (failure instanceof UnknownError) {
                logger.error('Unexpected failure processing "%s": %s', candidate.displayTitle, failure.message, { cause: describeError(failure.cause) });
            } else {
                logger.error('Failed to process "%s": %s', candidate.displayTitle, failure.message);
            }
            await cleanUp(candidate, workingPath);
            return { status: 'failed', identifier, error: failure };
        }

        const audioPath = await applyRetention(candidate, workingPath);
        await notify(candidate, transcriptPath);

        await config.stateStore.markProcessed(identifier);
        try {
            await output.release(identifier);
        } catch (error: unknown) {
            // Committed either way; the next sweep prunes it
            logger.warn('Could not drop the name reservation of "%s": %s', candidate.displayTitle, describeError(error));
        }
        logger.info('Finished "%s"', candidate.displayTitle);
        return { status: 'success', identifier, transcriptPath, audioPath };
    };

    const sweep = async (): Promise<number> => {
        const removed = await output.sweep();
        if (removed > 0) {
            logger.info('Removed %d temporary file(s) left by an earlier run', removed);
        }
        const pruned = await output.pruneReservations(identifier => config.stateStore.isProcessed(identifier));
        if (pruned > 0) {
            logger.verbose('Dropped %d reservation(s) of committed episodes', pruned);
        }
        return removed;
    };

    return {
        process: processEpisode,
        sweep,
    };
};
