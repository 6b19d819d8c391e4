import * as CliEngine from './cli-engine';
import { EngineConfig, TranscriptionEngine } from './types';

/**
 * faster-whisper through its whisper-ctranslate2 command line.
 */
export const create = (config: EngineConfig): TranscriptionEngine =>
    CliEngine.create('faster-whisper', config, (audioPath, outputDirectory) => [
        audioPath,
        '--model', config.model,
        '--device', config.device,
        '--compute_type', config.precision,
        '--beam_size', '5',
        '--output_format', 'json',
        '--output_dir', outputDirectory,
        '--verbose', config.verbose ? 'True' : 'False',
    ]);
