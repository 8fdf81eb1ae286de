export const DEFAULT_PRIMARY_PORT = 3000;
export const DEFAULT_FALLBACK_PORT = 3001;

export const DEFAULT_SAMPLE_INTERVAL_MS = 1000;
export const DEFAULT_SIMULATED_DEVICES = 1;
export const DEFAULT_NOTIFICATION_MIN_INTERVAL_MS = 10000;
export const DEFAULT_HISTORY_CAPACITY = 300;
export const DEFAULT_ALERTS_LIMIT = 20;

export const HTTP_STATUS_OK = 200;
export const HTTP_STATUS_ACCEPTED = 202;
export const HTTP_STATUS_BAD_REQUEST = 400;
export const HTTP_STATUS_NOT_FOUND = 404;
export const HTTP_STATUS_INTERNAL_ERROR = 500;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export const BYTES_PER_MB = 1024 * 1024;

export const EMPTY_LENGTH = 0;
export const FIRST_INDEX = 0;

export const LOG_DIR = 'logs';
export const LOG_FILE_COMBINED = 'logs/combined.log';
export const LOG_FILE_ERROR = 'logs/error.log';
