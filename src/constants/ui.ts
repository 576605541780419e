// UI and display constants
export const UI_CONSTANTS = {
  EXIT_DELAY_MS: 100,
  BOX_WIDTH: 60,
  CONFIG_SECRET_MASK: '********',

  SPINNER_MESSAGES: {
    LOADING: 'Reading staged changes...',
    GENERATING: 'Generating commit message...',
    GENERATING_BATCH: 'Generating commit message for batch',
    STAGING: 'Staging files...',
    COMMITTING: 'Creating commit...',
    GROUPING: 'Grouping related files...',
  },
} as const;
