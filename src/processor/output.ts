/**
 * Output Manager
 *
 * Owns the output tree: working audio files under mp3/, transcripts under
 * transcripts/, and the temporary names that mark unfinished work.
 *
 * The names picked for an episode's transcript and retained audio are
 * reserved in `transcripts/.<identifier>.pending` before either file is
 * moved into place. A retry after a crash reuses the reserved names, so an
 * episode never ends up with two transcripts. The reservation is released
 * once the episode is committed.
 */

import * as path from 'node:path';
import { z } from 'zod';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import {
    AUDIO_DIRECTORY_NAME,
    RESERVATION_SUFFIX,
    TEMP_AUDIO_PREFIX,
    TEMP_TRANSCRIPT_SUFFIX,
    TRANSCRIPT_EXTENSION,
    TRANSCRIPTS_DIRECTORY_NAME,
} from '../constants';
import { describeError, isNodeError } from '../errors';
import { uniqueFilename } from '../util/filename';

export interface OutputConfig {
    outputDirectory: string;
}

export interface OutputInstance {
    readonly audioDirectory: string;
    readonly transcriptsDirectory: string;
    ensureDirectories(): Promise<void>;
    workingAudioPath(title: string, extension: string): string;
    writeTranscript(identifier: string, title: string, content: string): Promise<string>;
    retainAudio(identifier: string, workingPath: string, title: string): Promise<string>;
    discardAudio(workingPath: string): Promise<void>;
    /** Drops the name reservation of a committed episode */
    release(identifier: string): Promise<void>;
    /** Drops reservations left behind by episodes that were committed; returns the count */
    pruneReservations(isProcessed: (identifier: string) => boolean): Promise<number>;
    sweep(): Promise<number>;
}

const SafeNameSchema = z.string().min(1).refine(
    name => name === path.basename(name) && !name.startsWith('.'),
    'must be a plain file name',
);

const ReservationSchema = z.object({
    transcript: SafeNameSchema.optional(),
    audio: SafeNameSchema.optional(),
});

type Reservation = z.infer<typeof ReservationSchema>;
type ReservedKind = keyof Reservation;

export const isTemporaryAudio = (filename: string): boolean => filename.startsWith(TEMP_AUDIO_PREFIX);

export const isTemporaryTranscript = (filename: string): boolean =>
    filename.startsWith('.') && filename.endsWith(TEMP_TRANSCRIPT_SUFFIX);

const isReservation = (filename: string): boolean =>
    filename.startsWith('.') && filename.endsWith(RESERVATION_SUFFIX) && filename.length > 1 + RESERVATION_SUFFIX.length;

const reservationIdentifier = (filename: string): string => filename.slice(1, -RESERVATION_SUFFIX.length);

export const create = (config: OutputConfig): OutputInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const audioDirectory = path.join(config.outputDirectory, AUDIO_DIRECTORY_NAME);
    const transcriptsDirectory = path.join(config.outputDirectory, TRANSCRIPTS_DIRECTORY_NAME);

    const ensureDirectories = async (): Promise<void> => {
        await storage.createDirectory(audioDirectory);
        await storage.createDirectory(transcriptsDirectory);
    };

    const workingAudioPath = (title: string, extension: string): string =>
        path.join(audioDirectory, `${TEMP_AUDIO_PREFIX}${title}${extension}`);

    const reservationPath = (identifier: string): string =>
        path.join(transcriptsDirectory, `.${identifier}${RESERVATION_SUFFIX}`);

    const readReservation = async (filePath: string): Promise<Reservation> => {
        let content: string;
        try {
            content = await storage.readFile(filePath, 'utf8');
        } catch (error: unknown) {
            if (isNodeError(error, 'ENOENT')) {
                return {};
            }
            throw error;
        }
        try {
            const parsed = ReservationSchema.safeParse(JSON.parse(content));
            if (parsed.success) {
                return parsed.data;
            }
            logger.warn('Ignoring malformed reservation %s: %s', filePath, parsed.error.message);
        } catch (error: unknown) {
            logger.warn('Ignoring unreadable reservation %s: %s', filePath, describeError(error));
        }
        return {};
    };

    const listReservations = async (): Promise<string[]> => {
        if (!await storage.isDirectory(transcriptsDirectory)) {
            return [];
        }
        return (await storage.listFiles(transcriptsDirectory)).filter(isReservation);
    };

    // Names other unfinished episodes will move into place on their retry
    const reservedByOthers = async (identifier: string, kind: ReservedKind): Promise<Set<string>> => {
        const names = new Set<string>();
        for (const filename of await listReservations()) {
            if (reservationIdentifier(filename) === identifier) {
                continue;
            }
            const name = (await readReservation(path.join(transcriptsDirectory, filename)))[kind];
            if (name) {
                names.add(name);
            }
        }
        return names;
    };

    const reserve = async (identifier: string, kind: ReservedKind, directory: string, base: string, extension: string): Promise<string> => {
        const filePath = reservationPath(identifier);
        const reservation = await readReservation(filePath);
        const existing = reservation[kind];
        if (existing) {
            logger.debug('Reusing %s name %s reserved by an earlier attempt', kind, existing);
            return existing;
        }

        const taken = await reservedByOthers(identifier, kind);
        const filename = await uniqueFilename(base, extension,
            async candidate => taken.has(candidate) || await storage.exists(path.join(directory, candidate)));
        const updated: Reservation = kind === 'transcript'
            ? { ...reservation, transcript: filename }
            : { ...reservation, audio: filename };
        await storage.createDirectory(transcriptsDirectory);
        await storage.writeFileDurably(filePath, JSON.stringify(updated));
        return filename;
    };

    const writeTranscript = async (identifier: string, title: string, content: string): Promise<string> => {
        await storage.createDirectory(transcriptsDirectory);
        const filename = await reserve(identifier, 'transcript', transcriptsDirectory, title, TRANSCRIPT_EXTENSION);
        const finalPath = path.join(transcriptsDirectory, filename);
        const tempPath = path.join(transcriptsDirectory, `.${filename}${TEMP_TRANSCRIPT_SUFFIX}`);

        try {
            await storage.writeFileDurably(tempPath, content);
            // Replaces a transcript an interrupted attempt already moved into place
            await storage.moveFile(tempPath, finalPath);
        } catch (error: unknown) {
            await storage.deleteFile(tempPath);
            throw error;
        }

        logger.info('Transcript saved to %s', finalPath);
        return finalPath;
    };

    const retainAudio = async (identifier: string, workingPath: string, title: string): Promise<string> => {
        const filename = await reserve(identifier, 'audio', audioDirectory, title, path.extname(workingPath));
        const retainedPath = path.join(audioDirectory, filename);
        await storage.moveFile(workingPath, retainedPath);
        logger.info('Kept audio at %s', retainedPath);
        return retainedPath;
    };

    const release = async (identifier: string): Promise<void> => {
        await storage.deleteFile(reservationPath(identifier));
    };

    const pruneReservations = async (isProcessed: (identifier: string) => boolean): Promise<number> => {
        let removed = 0;
        for (const filename of await listReservations()) {
            if (isProcessed(reservationIdentifier(filename))
                && await storage.deleteFile(path.join(transcriptsDirectory, filename))) {
                logger.debug('Removed reservation %s of a committed episode', filename);
                removed++;
            }
        }
        return removed;
    };

    const discardAudio = async (workingPath: string): Promise<void> => {
        if (await storage.deleteFile(workingPath)) {
            logger.debug('Deleted working audio %s', workingPath);
        }
    };

    const removeMatching = async (directory: string, matches: (filename: string) => boolean): Promise<number> => {
        if (!await storage.isDirectory(directory)) {
            return 0;
        }
        let removed = 0;
        for (const filename of await storage.listFiles(directory)) {
            if (!matches(filename)) {
                continue;
            }
            const filePath = path.join(directory, filename);
            if (await storage.isFile(filePath) && await storage.deleteFile(filePath)) {
                logger.warn('Removed leftover temporary file %s', filePath);
                removed++;
            }
        }
        return removed;
    };

    const sweep = async (): Promise<number> =>
        await removeMatching(audioDirectory, isTemporaryAudio)
        + await removeMatching(transcriptsDirectory, isTemporaryTranscript);

    return {
        audioDirectory,
        transcriptsDirectory,
        ensureDirectories,
        workingAudioPath,
        writeTranscript,
        retainAudio,
        discardAudio,
        release,
        pruneReservations,
        sweep,
    };
};
