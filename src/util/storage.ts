import * as fs from 'node:fs/promises';
import { Stats } from 'node:fs';
import { isNodeError } from '../errors';

export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    createDirectory: (path: string) => Promise<void>;
    listFiles: (directory: string) => Promise<string[]>;
    stat: (path: string) => Promise<Stats>;
    getFileSize: (path: string) => Promise<number>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    writeFileDurably: (path: string, data: string | Uint8Array) => Promise<void>;
    appendDurably: (path: string, data: string) => Promise<void>;
    moveFile: (source: string, destination: string) => Promise<void>;
    deleteFile: (path: string) => Promise<boolean>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => undefined);

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.stat(path);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (path: string): Promise<boolean> => {
        try {
            return (await fs.stat(path)).isDirectory();
        } catch {
            return false;
        }
    };

    const isFile = async (path: string): Promise<boolean> => {
        try {
            return (await fs.stat(path)).isFile();
        } catch {
            return false;
        }
    };

    const createDirectory = async (path: string): Promise<void> => {
        try {
            await fs.mkdir(path, { recursive: true });
        } catch (mkdirError: unknown) {
            throw new Error(`Failed to create output directory ${path}: ${mkdirError instanceof Error ? mkdirError.message : String(mkdirError)}`, { cause: mkdirError });
        }
    };

    const listFiles = async (directory: string): Promise<string[]> => {
        return await fs.readdir(directory);
    };

    const stat = async (path: string): Promise<Stats> => {
        return await fs.stat(path);
    };

    const getFileSize = async (path: string): Promise<number> => {
        return (await fs.stat(path)).size;
    };

    const readFile = async (path: string, encoding: BufferEncoding): Promise<string> => {
        return await fs.readFile(path, { encoding });
    };

    // Data reaches the disk before the promise resolves
    const writeFileDurably = async (path: string, data: string | Uint8Array): Promise<void> => {
        const handle = await fs.open(path, 'w');
        try {
            await handle.writeFile(data);
            await handle.sync();
        } finally {
            await handle.close();
        }
    };

    // Append mode only: existing bytes are never rewritten
    const appendDurably = async (path: string, data: string): Promise<void> => {
        const handle = await fs.open(path, 'a');
        try {
            await handle.appendFile(data, { encoding: 'utf8' });
            await handle.datasync();
        } finally {
            await handle.close();
        }
    };

    const moveFile = async (source: string, destination: string): Promise<void> => {
        try {
            await fs.rename(source, destination);
        } catch (error: unknown) {
            if (!isNodeError(error, 'EXDEV')) {
                throw error;
            }
            // Different filesystems: copy, then drop the source
            log('Cross-device move, copying %s to %s', source, destination);
            await fs.copyFile(source, destination);
            await fs.unlink(source);
        }
    };

    const deleteFile = async (path: string): Promise<boolean> => {
        try {
            await fs.unlink(path);
            return true;
        } catch (error: unknown) {
            if (isNodeError(error, 'ENOENT')) {
                return false;
            }
            throw error;
        }
    };

    return {
        exists,
        isDirectory,
        isFile,
        createDirectory,
        listFiles,
        stat,
        getFileSize,
        readFile,
        writeFileDurably,
        appendDurably,
        moveFile,
        deleteFile,
    };
};
