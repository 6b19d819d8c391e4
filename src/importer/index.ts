import * as Source from './source';

export type ImportSource = Source.SourceInstance;
export type { SourceConfig } from './source';

export const create = (config: Source.SourceConfig): ImportSource => Source.create(config);
