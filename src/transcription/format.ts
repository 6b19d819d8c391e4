import { formatTimestamp } from '../util/timestamp';
import { TranscriptionOutput } from './types';

/**
 * One `[start --> end] text` line per segment, or the plain text when the
 * engine reported no segments.
 */
export const formatTranscript = (output: TranscriptionOutput): string => {
    const segments = output.segments ?? [];
    if (segments.length === 0) {
        const text = output.text.trim();
        return text ? `${text}\n` : '';
    }
    return segments
        .map(segment => `[${formatTimestamp(segment.start)} --> ${formatTimestamp(segment.end)}] ${segment.text.trim()}\n`)
        .join('');
};
