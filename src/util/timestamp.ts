const pad = (value: number, length: number): string => value.toString().padStart(length, '0');

/**
 * Formats a number of seconds as HH:MM:SS.mmm
 */
export const formatTimestamp = (seconds: number): string => {
    if (!Number.isFinite(seconds) || seconds < 0) {
        throw new RangeError(`Expected a non-negative timestamp, got ${seconds}`);
    }
    let milliseconds = Math.round(seconds * 1000);
    const hours = Math.floor(milliseconds / 3_600_000);
    milliseconds %= 3_600_000;
    const minutes = Math.floor(milliseconds / 60_000);
    milliseconds %= 60_000;
    const secs = Math.floor(milliseconds / 1000);
    milliseconds %= 1000;
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)}.${pad(milliseconds, 3)}`;
};
