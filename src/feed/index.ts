/**
 * Feed Source
 *
 * Fetch failures raise FetchError, malformed documents ParseError. Entries
 * without a usable audio enclosure are dropped with a warning.
 */

import * as Source from './source';

export type FeedSource = Source.SourceInstance;
export type { SourceConfig } from './source';

export const create = (config: Source.SourceConfig = {}): FeedSource => Source.create(config);

export * from './entry';
