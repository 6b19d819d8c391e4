import { Command } from 'commander';
import { z } from 'zod';
import {
    DEFAULT_CHECK_INTERVAL_SECONDS,
    DEFAULT_COMPUTE_TYPE,
    DEFAULT_DEBUG,
    DEFAULT_DEVICE,
    DEFAULT_DOWNLOAD_RETRIES,
    DEFAULT_DOWNLOAD_TIMEOUT_SECONDS,
    DEFAULT_FASTER_WHISPER_BIN,
    DEFAULT_IMPORT_CHECK_INTERVAL_SECONDS,
    DEFAULT_KEEP_AUDIO,
    DEFAULT_LOOKBACK_DAYS,
    DEFAULT_OPENAI_WHISPER_BIN,
    DEFAULT_OUTPUT_DIRECTORY,
    DEFAULT_STAGING_POLICY,
    DEFAULT_TRANSCRIPTION_ENGINE,
    DEFAULT_WHISPER_MODEL,
    FEED_DELIMITER,
    PROGRAM_NAME,
    STAGING_POLICIES,
    TRANSCRIPTION_ENGINES,
    VERSION,
} from './constants';
import { ConfigurationError } from './errors';
import { getLogger } from './logging';

export type Args = {
    feeds?: string;
    importDir?: string;
    outputDir?: string;
    checkInterval?: string;
    importCheckInterval?: string;
    lookbackDays?: string;
    engine?: string;
    model?: string;
    device?: string;
    computeType?: string;
    keepAudio?: boolean;
    webhookUrl?: string;
    debug?: boolean;
    verbose?: boolean;
    once?: boolean;
};

const FlagSchema = z.union([
    z.boolean(),
    z.string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
        .transform(value => value === 'true' || value === '1' || value === 'yes'),
]);

const FeedListSchema = z.string()
    .transform(value => value.split(FEED_DELIMITER).map(feed => feed.trim()).filter(feed => feed.length > 0))
    .pipe(z.array(z.string().url()));

const SecondsSchema = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
    feeds: FeedListSchema.default(''),
    importDirectory: z.string().optional(),
    outputDirectory: z.string().default(DEFAULT_OUTPUT_DIRECTORY),
    checkIntervalSeconds: SecondsSchema.default(DEFAULT_CHECK_INTERVAL_SECONDS),
    importCheckIntervalSeconds: SecondsSchema.default(DEFAULT_IMPORT_CHECK_INTERVAL_SECONDS),
    lookbackDays: z.coerce.number().positive().default(DEFAULT_LOOKBACK_DAYS),
    engine: z.enum(TRANSCRIPTION_ENGINES).default(DEFAULT_TRANSCRIPTION_ENGINE),
    model: z.string().default(DEFAULT_WHISPER_MODEL),
    device: z.string().default(DEFAULT_DEVICE),
    computeType: z.string().default(DEFAULT_COMPUTE_TYPE),
    fasterWhisperBin: z.string().default(DEFAULT_FASTER_WHISPER_BIN),
    openaiWhisperBin: z.string().default(DEFAULT_OPENAI_WHISPER_BIN),
    keepAudio: FlagSchema.default(DEFAULT_KEEP_AUDIO),
    webhookUrl: z.string().url().optional(),
    downloadTimeoutSeconds: SecondsSchema.default(DEFAULT_DOWNLOAD_TIMEOUT_SECONDS),
    downloadRetries: z.coerce.number().int().min(1).default(DEFAULT_DOWNLOAD_RETRIES),
    stagingPolicy: z.enum(STAGING_POLICIES).default(DEFAULT_STAGING_POLICY),
    debug: FlagSchema.default(DEFAULT_DEBUG),
    verbose: z.boolean().default(false),
    once: z.boolean().default(false),
}).refine(config => config.feeds.length > 0 || config.importDirectory !== undefined, {
    message: `Configure at least one of PODCAST_FEEDS or IMPORT_DIR`,
    path: ['feeds'],
});

export type Config = z.infer<typeof ConfigSchema>;

type Environment = Record<string, string | undefined>;

// Where each setting comes from, for error messages
const SOURCES: Record<string, string> = {
    feeds: 'PODCAST_FEEDS / --feeds',
    importDirectory: 'IMPORT_DIR / --import-dir',
    outputDirectory: 'OUTPUT_DIR / --output-dir',
    checkIntervalSeconds: 'CHECK_INTERVAL_SECONDS / --check-interval',
    importCheckIntervalSeconds: 'IMPORT_CHECK_INTERVAL_SECONDS / --import-check-interval',
    lookbackDays: 'LOOKBACK_DAYS / --lookback-days',
    engine: 'TRANSCRIPTION_ENGINE / --engine',
    model: 'WHISPER_MODEL / --model',
    device: 'DEVICE / --device',
    computeType: 'COMPUTE_TYPE / --compute-type',
    fasterWhisperBin: 'FASTER_WHISPER_BIN',
    openaiWhisperBin: 'OPENAI_WHISPER_BIN',
    keepAudio: 'KEEP_MP3 / --keep-audio',
    webhookUrl: 'DISCORD_WEBHOOK_URL / --webhook-url',
    downloadTimeoutSeconds: 'DOWNLOAD_TIMEOUT_SECONDS',
    downloadRetries: 'DOWNLOAD_RETRIES',
    stagingPolicy: 'IMPORT_STAGING_POLICY',
    debug: 'DEBUG_LOGGING / --debug',
};

const createProgram = (): Command => new Command()
    .name(PROGRAM_NAME)
    .summary('Transcribe podcast episodes and imported audio')
    .description('Watches podcast feeds and an import folder, transcribing every new episode exactly once')
    .option('--feeds <urls>', `podcast feed URLs separated by "${FEED_DELIMITER}"`)
    .option('--import-dir <dir>', 'folder watched for audio files to transcribe')
    .option('--output-dir <dir>', 'root of the transcripts, audio and state file')
    .option('--check-interval <seconds>', 'seconds between checks')
    .option('--import-check-interval <seconds>', 'seconds between checks when only the import folder is watched')
    .option('--lookback-days <days>', 'only transcribe feed episodes published within this many days')
    .option('--engine <name>', `transcription engine (${TRANSCRIPTION_ENGINES.join(', ')})`)
    .option('--model <name>', 'whisper model')
    .option('--device <name>', 'device to run the model on')
    .option('--compute-type <type>', 'compute type / precision')
    .option('--keep-audio', 'keep audio files after transcription')
    .option('--webhook-url <url>', 'Discord webhook notified for each transcript')
    .option('--debug', 'enable debug logging')
    .option('--verbose', 'enable verbose logging')
    .option('--once', 'run a single pass and exit')
    .version(VERSION);

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map(issue => {
        const key = issue.path[0];
        const source = typeof key === 'string' ? SOURCES[key] ?? key : 'configuration';
        return `${source}: ${issue.message}`;
    });

/**
 * Reads settings from the environment, lets command-line flags override
 * them, and validates the result.
 */
export const configure = (argv: string[] = process.argv, env: Environment = process.env): Config => {
    const program = createProgram();
    program.parse(argv);
    const cliArgs: Args = program.opts<Args>();
    getLogger().debug('Command Line Options: %s', JSON.stringify(cliArgs));

    const fromEnv = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };

    const raw = {
        feeds: cliArgs.feeds ?? fromEnv('PODCAST_FEEDS'),
        importDirectory: cliArgs.importDir ?? fromEnv('IMPORT_DIR'),
        outputDirectory: cliArgs.outputDir ?? fromEnv('OUTPUT_DIR'),
        checkIntervalSeconds: cliArgs.checkInterval ?? fromEnv('CHECK_INTERVAL_SECONDS'),
        importCheckIntervalSeconds: cliArgs.importCheckInterval ?? fromEnv('IMPORT_CHECK_INTERVAL_SECONDS'),
        lookbackDays: cliArgs.lookbackDays ?? fromEnv('LOOKBACK_DAYS'),
        engine: cliArgs.engine ?? fromEnv('TRANSCRIPTION_ENGINE'),
        model: cliArgs.model ?? fromEnv('WHISPER_MODEL'),
        device: cliArgs.device ?? fromEnv('DEVICE'),
        computeType: cliArgs.computeType ?? fromEnv('COMPUTE_TYPE'),
        fasterWhisperBin: fromEnv('FASTER_WHISPER_BIN'),
        openaiWhisperBin: fromEnv('OPENAI_WHISPER_BIN'),
        keepAudio: cliArgs.keepAudio ?? fromEnv('KEEP_MP3'),
        webhookUrl: cliArgs.webhookUrl ?? fromEnv('DISCORD_WEBHOOK_URL'),
        downloadTimeoutSeconds: fromEnv('DOWNLOAD_TIMEOUT_SECONDS'),
        downloadRetries: fromEnv('DOWNLOAD_RETRIES'),
        stagingPolicy: fromEnv('IMPORT_STAGING_POLICY'),
        debug: cliArgs.debug ?? fromEnv('DEBUG_LOGGING'),
        verbose: cliArgs.verbose,
        once: cliArgs.once,
    };

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(formatIssues(result.error));
    }
    return result.data;
};
