/**
 * Transcription System
 *
 * The engine is chosen once at start-up; the rest of the pipeline only sees
 * the TranscriptionEngine interface.
 */

import type { TranscriptionEngineName } from '../types';
import * as FasterWhisper from './faster-whisper';
import * as OpenAIWhisper from './openai-whisper';
import { EngineConfig, TranscriptionEngine } from './types';

export const create = (engine: TranscriptionEngineName, config: EngineConfig): TranscriptionEngine => {
    switch (engine) {
        case 'faster-whisper':
            return FasterWhisper.create(config);
        case 'openai-whisper':
            return OpenAIWhisper.create(config);
    }
};

export * from './types';
export { formatTranscript } from './format';
