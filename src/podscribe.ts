import 'dotenv/config';
import * as path from 'node:path';
import * as Arguments from '@/arguments';
import { DAY_IN_MS, PROGRAM_NAME, STATE_FILE_NAME, VERSION } from '@/constants';
import { ConfigurationError, describeError } from '@/errors';
import * as Feed from '@/feed';
import * as Importer from '@/importer';
import { getLogger, LogLevel, setLogLevel } from '@/logging';
import * as Notification from '@/notification';
import * as Processor from '@/processor';
import * as Scheduler from '@/scheduler';
import * as State from '@/state';
import * as Transcription from '@/transcription';

const logLevelFor = (config: Arguments.Config): LogLevel => {
    if (config.debug) {
        return 'debug';
    }
    return config.verbose ? 'verbose' : 'info';
};

const logSummary = (config: Arguments.Config): void => {
    const logger = getLogger();
    logger.info('Transcription engine: %s (model %s, device %s, precision %s)', config.engine, config.model, config.device, config.computeType);
    logger.info('Keep audio: %s', config.keepAudio ? 'yes' : 'no');
    logger.info('Notifications: %s', config.webhookUrl ? 'Discord' : 'disabled');
    logger.info('Feeds: %d', config.feeds.length);
    logger.info('Import folder: %s', config.importDirectory ?? 'disabled');
    logger.info('Output folder: %s', config.outputDirectory);
    logger.info('Lookback window: %d day(s)', config.lookbackDays);
};

const executableFor = (config: Arguments.Config): string =>
    config.engine === 'faster-whisper' ? config.fasterWhisperBin : config.openaiWhisperBin;

export async function main(argv: string[] = process.argv): Promise<void> {
    let config: Arguments.Config;
    try {
        config = Arguments.configure(argv);
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
            for (const problem of error.problems) {
                getLogger().error('Configuration problem: %s', problem);
            }
            process.exit(1);
        }
        throw error;
    }

    setLogLevel(logLevelFor(config));
    const logger = getLogger();
    logger.info('Starting %s: %s', PROGRAM_NAME, VERSION);
    logSummary(config);

    try {
        const stateStore = await State.create(path.join(config.outputDirectory, STATE_FILE_NAME));
        const importSource = config.importDirectory
            ? Importer.create({ importDirectory: config.importDirectory })
            : undefined;

        const processor = Processor.create({
            outputDirectory: config.outputDirectory,
            keepAudio: config.keepAudio,
            downloadTimeoutMs: config.downloadTimeoutSeconds * 1000,
            downloadAttempts: config.downloadRetries,
            stateStore,
            engine: Transcription.create(config.engine, {
                model: config.model,
                device: config.device,
                precision: config.computeType,
                verbose: config.debug,
                executable: executableFor(config),
            }),
            notifier: Notification.create({ webhookUrl: config.webhookUrl }),
            importSource,
        });

        const scheduler = Scheduler.create({
            feeds: config.feeds,
            feedSource: Feed.create(),
            importSource,
            processor,
            stateStore,
            lookbackWindowMs: config.lookbackDays * DAY_IN_MS,
            intervalMs: Scheduler.pollingIntervalMs({
                feedCount: config.feeds.length,
                importEnabled: importSource !== undefined,
                checkIntervalSeconds: config.checkIntervalSeconds,
                importCheckIntervalSeconds: config.importCheckIntervalSeconds,
            }),
            stagingPolicy: config.stagingPolicy,
            once: config.once,
        });

        const shutdown = (signal: string): void => {
            logger.info('Received %s, finishing the current episode before exiting', signal);
            scheduler.stop().catch((error: unknown) => {
                logger.error('Error while stopping: %s', describeError(error));
            });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        await scheduler.start();
        logger.info('%s exiting', PROGRAM_NAME);
    } catch (error: unknown) {
        logger.error('Fatal error: %s', describeError(error), { stack: error instanceof Error ? error.stack : undefined });
        process.exit(1);
    }
}
