/**
 * Import Source
 *
 * Scans the watched import directory for audio files and claims them by
 * renaming them into a staging directory before processing. Staging lives
 * inside the import root, so the claim is a same-filesystem rename.
 */

import * as path from 'node:path';
import { glob } from 'glob';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { QUARANTINE_DIRECTORY_NAME, STAGING_DIRECTORY_NAME, SUPPORTED_AUDIO_EXTENSIONS } from '../constants';
import { isNodeError } from '../errors';
import { ImportCandidate, StagingPolicy } from '../types';
import { sanitizeFilename, uniqueFilename } from '../util/filename';
import { importFileIdentifier } from '../util/identifier';

export interface SourceConfig {
    importDirectory: string;
    extensions?: string[];
}

export interface SourceInstance {
    scan(): Promise<ImportCandidate[]>;
    claim(candidate: ImportCandidate): Promise<string | null>;
    /** Moves a claimed file back into the import root, under `filename` when given */
    release(filePath: string, filename?: string): Promise<string>;
    recover(policy: StagingPolicy, isProcessed: (identifier: string) => boolean): Promise<ImportCandidate[]>;
    readonly stagingDirectory: string;
    readonly quarantineDirectory: string;
}

export const create = (config: SourceConfig): SourceInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const extensions = (config.extensions ?? SUPPORTED_AUDIO_EXTENSIONS).map(ext => ext.toLowerCase());
    const stagingDirectory = path.join(config.importDirectory, STAGING_DIRECTORY_NAME);
    const quarantineDirectory = path.join(config.importDirectory, QUARANTINE_DIRECTORY_NAME);

    const patterns = extensions.map(ext => `*${ext}`);

    const describe = async (filePath: string, staged: boolean): Promise<ImportCandidate> => {
        const stats = await storage.stat(filePath);
        const basename = path.basename(filePath);
        const displayTitle = path.basename(basename, path.extname(basename));
        return {
            sourceKind: 'import',
            identifier: importFileIdentifier(basename, stats.size, stats.mtimeMs),
            title: sanitizeFilename(displayTitle),
            displayTitle,
            audioLocation: filePath,
            publishedAt: null,
            modifiedAt: stats.mtime,
            staged,
        };
    };

    const listAudioFiles = async (directory: string): Promise<string[]> => {
        // Only the top level: staging and quarantine are subdirectories
        return await glob(patterns, {
            cwd: directory,
            nodir: true,
            absolute: true,
            nocase: true,
            dot: false,
        });
    };

    const describeAll = async (files: string[], staged: boolean): Promise<ImportCandidate[]> => {
        const candidates: ImportCandidate[] = [];
        for (const file of files) {
            try {
                candidates.push(await describe(file, staged));
            } catch (error: unknown) {
                // Removed between listing and stat
                if (isNodeError(error, 'ENOENT')) {
                    logger.debug('Import file %s disappeared during scan', file);
                    continue;
                }
                throw error;
            }
        }
        return candidates.sort((a, b) =>
            a.modifiedAt.getTime() - b.modifiedAt.getTime()
            || a.audioLocation.localeCompare(b.audioLocation));
    };

    const scan = async (): Promise<ImportCandidate[]> => {
        if (!await storage.isDirectory(config.importDirectory)) {
            logger.warn('Import directory %s not found or not a directory, skipping', config.importDirectory);
            return [];
        }

        logger.verbose('Checking import folder: %s', config.importDirectory);
        const candidates = await describeAll(await listAudioFiles(config.importDirectory), false);
        for (const candidate of candidates) {
            logger.debug('Found import file: %s', candidate.audioLocation);
        }
        return candidates;
    };

    const claim = async (candidate: ImportCandidate): Promise<string | null> => {
        if (candidate.staged) {
            return candidate.audioLocation;
        }

        await storage.createDirectory(stagingDirectory);
        const stagedPath = path.join(stagingDirectory, path.basename(candidate.audioLocation));
        try {
            await storage.moveFile(candidate.audioLocation, stagedPath);
        } catch (error: unknown) {
            if (isNodeError(error, 'ENOENT')) {
                logger.warn('Import file %s vanished before it could be claimed', candidate.audioLocation);
                return null;
            }
            throw error;
        }
        logger.debug('Claimed %s into staging', candidate.audioLocation);
        return stagedPath;
    };

    // Never overwrite: an existing file of the same name gets a _2, _3 ... sibling
    const availablePath = async (directory: string, filename: string): Promise<string> => {
        const extension = path.extname(filename);
        const available = await uniqueFilename(
            path.basename(filename, extension),
            extension,
            candidate => storage.exists(path.join(directory, candidate)),
        );
        return path.join(directory, available);
    };

    const release = async (filePath: string, filename: string = path.basename(filePath)): Promise<string> => {
        const target = await availablePath(config.importDirectory, filename);
        await storage.moveFile(filePath, target);
        logger.info('Returned %s to the import folder for another attempt', path.basename(target));
        return target;
    };

    const recover = async (policy: StagingPolicy, isProcessed: (identifier: string) => boolean): Promise<ImportCandidate[]> => {
        if (!await storage.isDirectory(stagingDirectory)) {
            return [];
        }

        const residue = await describeAll(await listAudioFiles(stagingDirectory), true);
        const resumed: ImportCandidate[] = [];
        for (const candidate of residue) {
            const name = path.basename(candidate.audioLocation);
            if (isProcessed(candidate.identifier)) {
                logger.info('Staged import %s was already transcribed, removing it', name);
                await storage.deleteFile(candidate.audioLocation);
                continue;
            }

            if (policy === 'quarantine') {
                await storage.createDirectory(quarantineDirectory);
                const target = await availablePath(quarantineDirectory, name);
                await storage.moveFile(candidate.audioLocation, target);
                logger.warn('Staged import %s was interrupted by a crash and has been quarantined as %s; move it back to the import folder to retry', name, target);
                continue;
            }

            logger.warn('Resuming staged import %s interrupted by a previous run', name);
            resumed.push(candidate);
        }
        return resumed;
    };

    return {
        scan,
        claim,
        release,
        recover,
        stagingDirectory,
        quarantineDirectory,
    };
};
