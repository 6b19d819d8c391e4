/**
 * Shared plumbing for engines driven through a command-line program: runs
 * the program against a private output directory and reads back its JSON.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import * as Logging from '../logging';
import * as Child from '../util/child';
import { TranscriptionError, describeError } from '../errors';
import type { TranscriptionEngineName } from '../types';
import { formatTranscript } from './format';
import { EngineConfig, TranscriptionEngine, TranscriptionOutputSchema } from './types';

export type ArgumentBuilder = (audioPath: string, outputDirectory: string) => string[];

export const create = (name: TranscriptionEngineName, config: EngineConfig, buildArguments: ArgumentBuilder): TranscriptionEngine => {
    const logger = Logging.getLogger();
    const runner = config.runner ?? Child.run;

    const readOutput = async (audioPath: string, outputDirectory: string): Promise<string> => {
        const outputFile = path.join(outputDirectory, `${path.parse(audioPath).name}.json`);
        let raw: string;
        try {
            raw = await fs.readFile(outputFile, 'utf-8');
        } catch (error: unknown) {
            throw new TranscriptionError(name, `Engine produced no output for ${path.basename(audioPath)}`, { cause: error });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error: unknown) {
            throw new TranscriptionError(name, `Engine output is not valid JSON: ${describeError(error)}`, { cause: error });
        }
        const parsed = TranscriptionOutputSchema.safeParse(json);
        if (!parsed.success) {
            throw new TranscriptionError(name, `Engine output has an unexpected shape: ${parsed.error.message}`);
        }

        const output = parsed.data;
        if (output.language) {
            logger.info('[%s] Detected language %s', name, output.language);
        }
        logger.info('[%s] Transcribed %d segment(s)', name, output.segments?.length ?? 0);
        return formatTranscript(output);
    };

    const transcribe = async (audioPath: string): Promise<string> => {
        const outputDirectory = await fs.mkdtemp(path.join(config.tempDirectory ?? os.tmpdir(), `podscribe-${name}-`));
        try {
            const args = buildArguments(audioPath, outputDirectory);
            logger.info('[%s] Starting transcription of %s (model %s, device %s)', name, path.basename(audioPath), config.model, config.device);
            logger.debug('[%s] Running %s %s', name, config.executable, args.join(' '));

            try {
                const { stdout, stderr } = await runner(config.executable, args);
                if (config.verbose) {
                    logger.debug('[%s] stdout: %s', name, stdout.trim());
                    logger.debug('[%s] stderr: %s', name, stderr.trim());
                }
            } catch (error: unknown) {
                throw new TranscriptionError(name, `${config.executable} failed: ${describeError(error)}`, { cause: error });
            }

            return await readOutput(audioPath, outputDirectory);
        } finally {
            await fs.rm(outputDirectory, { recursive: true, force: true });
        }
    };

    return {
        name,
        transcribe,
    };
};
