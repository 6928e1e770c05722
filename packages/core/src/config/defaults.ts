/**
 * Default constants for WorksheetBot configuration
 */

export const LLM_DEFAULTS = {
  MODEL: 'gpt-4o-mini' as const,
  BASE_URL: 'https://api.openai.com/v1' as const,
  TIMEOUT_MS: 20_000 as const,
  /** Handed to the OpenAI client; WorksheetBot itself never retries. */
  MAX_RETRIES: 2 as const,
};

export const HISTORY_DEFAULTS = {
  DIR: './data/history' as const,
  /** Messages kept when a session is hydrated from disk. */
  RETENTION: 20 as const,
  SESSION_ID: 'worksheet_session' as const,
};

export const WORKSHEET_DEFAULTS = {
  OUTPUT_DIR: './data/worksheets' as const,
  FORMATS: ['html'] as const,
  MIN_QUESTIONS: 12 as const,
  INSTRUCTIONS: 'Read each question together and encourage pointing and counting.' as const,
  TIPS: 'Celebrate effort and keep sessions short and fun.' as const,
  FILLER_PROMPT: 'Draw and count stars or cars.' as const,
};

export const MAIL_DEFAULTS = {
  PORT: 465 as const,
  SECURE: true as const,
  SUBJECT: 'New Worksheet from WorksheetBot' as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,
};
