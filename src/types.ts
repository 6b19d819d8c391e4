/**
 * Core Types
 *
 * Shared type definitions for episode discovery and processing.
 */

import type { EpisodeError } from './errors';

export type SourceKind = 'feed' | 'import';

interface CandidateBase {
    /** Stable across restarts for the same logical episode */
    identifier: string;
    /** Sanitized, safe to use as a file name */
    title: string;
    /** Title as published, for logs and notifications */
    displayTitle: string;
    /** Remote URL for feed episodes, local path for imports */
    audioLocation: string;
}

export interface FeedCandidate extends CandidateBase {
    sourceKind: 'feed';
    publishedAt: Date | null;
    feedUrl: string;
    /** Position of the feed in the configured list */
    feedOrder: number;
}

export interface ImportCandidate extends CandidateBase {
    sourceKind: 'import';
    publishedAt: null;
    modifiedAt: Date;
    /** Already sitting in staging (resumed after a crash) */
    staged: boolean;
}

export type EpisodeCandidate = FeedCandidate | ImportCandidate;

export type ProcessingOutcome =
    | { status: 'success'; identifier: string; transcriptPath: string; audioPath: string | null }
    | { status: 'skipped'; identifier: string; reason: string }
    | { status: 'failed'; identifier: string; error: EpisodeError };

export type TranscriptionEngineName = 'faster-whisper' | 'openai-whisper';

export type StagingPolicy = 'resume' | 'quarantine';
