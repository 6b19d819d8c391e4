import { FALLBACK_FILENAME, MAX_FILENAME_BYTES } from '../constants';

/**
 * Cuts a string to at most `maxBytes` of UTF-8 without splitting a code point.
 */
export const truncateBytes = (value: string, maxBytes: number): string => {
    let result = '';
    let bytes = 0;
    for (const character of value) {
        const size = Buffer.byteLength(character, 'utf8');
        if (bytes + size > maxBytes) {
            break;
        }
        result += character;
        bytes += size;
    }
    return result;
};

/**
 * Removes characters that are unsafe in file names and replaces whitespace
 * runs with underscores.
 */
export const sanitizeFilename = (value: string): string => {
    const sanitized = truncateBytes(
        value
            .replace(/[\\/*?:"<>|]/g, '')
            .replace(/\s+/g, '_'),
        MAX_FILENAME_BYTES,
    );
    return sanitized.length > 0 ? sanitized : FALLBACK_FILENAME;
};

/**
 * Returns `<base><extension>` or, when taken, `<base>_2<extension>`,
 * `<base>_3<extension>` and so on.
 */
export const uniqueFilename = async (
    base: string,
    extension: string,
    isTaken: (filename: string) => Promise<boolean>,
): Promise<string> => {
    let candidate = `${base}${extension}`;
    let counter = 2;
    while (await isTaken(candidate)) {
        candidate = `${base}_${counter}${extension}`;
        counter++;
    }
    return candidate;
};
