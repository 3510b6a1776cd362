export const COMMENT_MARKER = '#';
export const ASSIGNMENT_MARKER = '=';

export const DEFAULT_LOCAL_FILENAME = '.env';
export const DEFAULT_TEMPLATE_FILENAME = '.env.template';

/** Environment variable read for the log level when no flag sets one. */
export const LOG_LEVEL_ENV_VAR = 'ENV_SYNC_LOG';
