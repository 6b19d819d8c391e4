import * as CliEngine from './cli-engine';
import { EngineConfig, TranscriptionEngine } from './types';

// openai-whisper only distinguishes half from full precision
const usesHalfPrecision = (precision: string): boolean => precision.toLowerCase() === 'float16';

export const create = (config: EngineConfig): TranscriptionEngine =>
    CliEngine.create('openai-whisper', config, (audioPath, outputDirectory) => [
        audioPath,
        '--model', config.model,
        '--device', config.device,
        '--fp16', usesHalfPrecision(config.precision) ? 'True' : 'False',
        '--output_format', 'json',
        '--output_dir', outputDirectory,
        '--verbose', config.verbose ? 'True' : 'False',
    ]);
