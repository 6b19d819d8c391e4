import * as Processor from './processor';

export type EpisodeProcessor = Processor.ProcessorInstance;
export type { ProcessorConfig } from './processor';

export const create = Processor.create;

export { audioExtension } from './download';
export { isTemporaryAudio, isTemporaryTranscript } from './output';
