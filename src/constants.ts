export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'podscribe';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

// Filesystem layout below the output root
export const STATE_FILE_NAME = '.processed_episodes.log';
export const AUDIO_DIRECTORY_NAME = 'mp3';
export const TRANSCRIPTS_DIRECTORY_NAME = 'transcripts';
export const STAGING_DIRECTORY_NAME = '.processing_tmp';
export const QUARANTINE_DIRECTORY_NAME = '.quarantine';

// Working files carry these markers so a start-up sweep can find crash residue
export const TEMP_AUDIO_PREFIX = '_temp_';
export const PARTIAL_DOWNLOAD_SUFFIX = '.part';
export const TEMP_TRANSCRIPT_SUFFIX = '.processing';
// Names chosen for an episode's outputs, kept until its commit
export const RESERVATION_SUFFIX = '.pending';

export const TRANSCRIPT_EXTENSION = '.txt';
export const DEFAULT_AUDIO_EXTENSION = '.mp3';
export const SUPPORTED_AUDIO_EXTENSIONS = ['.mp3', '.wav', '.m4a', '.flac', '.ogg', '.aac', '.opus'];

// UTF-8 bytes; leaves room below the usual 255-byte limit for the _temp_, _N, .part and .processing decorations
export const MAX_FILENAME_BYTES = 200;
export const FALLBACK_FILENAME = 'episode';

export const FEED_DELIMITER = ';';

export const TRANSCRIPTION_ENGINES = ['faster-whisper', 'openai-whisper'] as const;
export const STAGING_POLICIES = ['resume', 'quarantine'] as const;

export const DEFAULT_OUTPUT_DIRECTORY = '/out';
export const DEFAULT_CHECK_INTERVAL_SECONDS = 3600;
export const DEFAULT_IMPORT_CHECK_INTERVAL_SECONDS = 60;
export const DEFAULT_LOOKBACK_DAYS = 7;
export const DEFAULT_TRANSCRIPTION_ENGINE = 'faster-whisper';
export const DEFAULT_WHISPER_MODEL = 'base';
export const DEFAULT_DEVICE = 'cpu';
export const DEFAULT_COMPUTE_TYPE = 'default';
export const DEFAULT_FASTER_WHISPER_BIN = 'whisper-ctranslate2';
export const DEFAULT_OPENAI_WHISPER_BIN = 'whisper';
export const DEFAULT_KEEP_AUDIO = false;
export const DEFAULT_DOWNLOAD_TIMEOUT_SECONDS = 300;
export const DEFAULT_DOWNLOAD_RETRIES = 3;
export const DEFAULT_STAGING_POLICY = 'resume';
export const DEFAULT_DEBUG = false;

export const FEED_TIMEOUT_MS = 30000;
export const DOWNLOAD_RETRY_DELAY_MS = 5000;
export const NOTIFICATION_TIMEOUT_MS = 30000;

// Discord rejects attachments above 8MB
export const MAX_ATTACHMENT_BYTES = 7.8 * 1024 * 1024;
export const NOTIFICATION_EXCERPT_LENGTH = 500;

export const DAY_IN_MS = 24 * 60 * 60 * 1000;
