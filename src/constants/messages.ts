// Error messages and user-facing text constants
export const ERROR_MESSAGES = {
  API_KEY_NOT_FOUND: 'Gemini API key not found. Please set the GEMINI_API_KEY environment variable',
  NOT_GIT_REPOSITORY: 'Not a git repository. Run this command inside a git working tree.',
  NO_STAGED_CHANGES: 'No staged changes found. Please stage your changes with "git add" first.',
  NO_FILES_TO_STAGE: 'No files provided to stage',
  EMPTY_AI_RESPONSE: 'Empty response from AI model',
  INVALID_AI_RESPONSE: 'AI response is not a valid commit suggestion',
  PROMPT_SIZE_EXCEEDED: 'Prompt size exceeds limit of',
  NO_SUGGESTIONS: 'No commit suggestions to combine',
  INVALID_CONFIG_KEY: 'Invalid configuration key',
  COMMIT_NOT_CREATED: 'Git did not create a commit',
  NO_BATCHES_PROCESSED: 'No batches were processed successfully',
} as const;

export const SUCCESS_MESSAGES = {
  SETUP_COMPLETED: 'Setup completed successfully!',
  CONFIGURATION_RESET: 'Configuration reset to defaults',
  COMMIT_CREATED: 'Changes committed successfully!',
  COMBINED_COMMIT_CREATED: 'Combined commit created successfully!',
} as const;

export const INFO_MESSAGES = {
  WELCOME_SETUP: '🚀 Welcome to commitweave setup!',
  CHANGED_FILES: '📁 Changed files:',
  ANALYSIS_TITLE: '📊 Change analysis:',
  GROUPS_TITLE: '🧩 Smart groups:',
  DRY_RUN_NOTICE: 'Dry run: nothing will be staged or committed.',
  WOULD_COMMIT: 'Would commit',
  SMART_GROUPING_ON: 'Smart grouping enabled',
  FIXED_BATCHES: 'Splitting changes into fixed-size batches',
} as const;

export const WARNING_MESSAGES = {
  COMMIT_ABORTED: 'Commit aborted.',
  PROCESS_STOPPED: 'Stopped before processing the remaining batches.',
  NOTHING_COMMITTED: 'Nothing was committed.',
  RESET_CANCELLED: 'Reset cancelled',
  INVALID_ENV_OVERRIDE: 'Ignoring invalid environment override',
  INVALID_CONFIG_FILE: 'Invalid config file, using defaults',
} as const;

export const PROMPT_MESSAGES = {
  CREATE_COMMIT: 'Create commit with this message?',
  CONTINUE_BATCHES: 'Continue with the next batch?',
  TRY_NEXT_BATCH: 'Try the next batch?',
  COMMIT_INDIVIDUALLY: 'Create an individual commit for each batch? (no combines them into one)',
  RESET_CONFIG: 'Reset all configuration to defaults?',
  MODEL: 'Choose the default model:',
  SMART_GROUPING: 'Group related files automatically?',
} as const;

export const HELP_MESSAGES = {
  CONFIG_MODIFY: 'Use "cw config" to modify settings later.',
  USAGE: 'You can now use "cw" or "commitweave" to write AI-assisted commits.',
  API_KEY_ENV: 'The API key is read from GEMINI_API_KEY and is never written to disk.',
} as const;
