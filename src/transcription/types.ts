/**
 * Transcription System Types
 *
 * Engines are external command-line programs. Both supported engines write a
 * JSON document with the full text and timed segments.
 */

import { z } from 'zod';
import type { TranscriptionEngineName } from '../types';
import type { Runner } from '../util/child';

export interface EngineConfig {
    model: string;
    device: string;
    /** compute type for faster-whisper; float16 enables fp16 for openai-whisper */
    precision: string;
    verbose: boolean;
    /** Executable to invoke */
    executable: string;
    tempDirectory?: string;
    runner?: Runner;
}

export interface TranscriptionEngine {
    readonly name: TranscriptionEngineName;
    transcribe(audioPath: string): Promise<string>;
}

export const TranscriptionSegmentSchema = z.object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
});

export const TranscriptionOutputSchema = z.object({
    text: z.string(),
    language: z.string().optional(),
    segments: z.array(TranscriptionSegmentSchema).optional(),
});

export type TranscriptionSegment = z.infer<typeof TranscriptionSegmentSchema>;
export type TranscriptionOutput = z.infer<typeof TranscriptionOutputSchema>;
