import type { CommitCategory, CommitSuggestion } from '../types/common.js';
import { COMBINED_COMMIT_TITLE } from '../constants/ai.js';
import { ERROR_MESSAGES } from '../constants/messages.js';

const formatCategoryHeading = (category: string, content: CommitCategory): string =>
  content.emoji ? `${content.emoji} ${category}:` : `${category}:`;

/** Category sections followed by the summary; everything below the title. */
export const formatCommitBody = (suggestion: CommitSuggestion): string => {
  const sections = Object.entries(suggestion.body)
    .filter(([, content]) => content.changes.length > 0)
    .map(([category, content]) =>
      [formatCategoryHeading(category, content), ...content.changes.map((change) => `- ${change}`)].join(
        '\n'
      )
    );

  return [...sections, suggestion.summary]
    .filter((section) => section.trim().length > 0)
    .join('\n\n');
};

export const formatCommitMessage = (suggestion: CommitSuggestion): string => {
  const body = formatCommitBody(suggestion);
  return body ? `${suggestion.title}\n\n${body}` : suggestion.title;
};

/**
 * Merges several suggestions into one commit. Categories keep the first emoji
 * seen and append changes in order; summaries are joined with a space.
 */
export const combineSuggestions = (suggestions: readonly CommitSuggestion[]): CommitSuggestion => {
  if (suggestions.length === 0) {
    throw new Error(ERROR_MESSAGES.NO_SUGGESTIONS);
  }

  const body: Record<string, CommitCategory> = {};

  for (const suggestion of suggestions) {
    for (const [category, content] of Object.entries(suggestion.body)) {
      const existing = body[category];
      if (existing) {
        existing.changes.push(...content.changes);
      } else {
        body[category] = { emoji: content.emoji, changes: [...content.changes] };
      }
    }
  }

  return {
    title: COMBINED_COMMIT_TITLE,
    body,
    summary: suggestions
      .map((suggestion) => suggestion.summary.trim())
      .filter((summary) => summary.length > 0)
      .join(' '),
  };
};
