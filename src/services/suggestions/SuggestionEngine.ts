import { log, LogLevel } from '../../logger';
import { TaskSuggestion, TaskTextSource } from '../../types/task';
import { DEFAULT_KEYWORD_LIMIT, extractKeywords, formatKeyword, rankKeywords } from './keywords';

export const SUGGESTION_TEMPLATES: readonly string[] = [
  'Follow-up on {}',
  'Finalize {}',
  'Plan next steps for {}',
  'Schedule meeting for {}',
  'Prepare report regarding {}',
  'Start working on {}',
];

export const MAX_SUGGESTIONS_PER_KEYWORD = 3;

export const DEFAULT_SUGGESTIONS: readonly TaskSuggestion[] = [
  { suggested_title: 'Weekly Planning Session' },
  { suggested_title: 'Project Status Review' },
  { suggested_title: 'Team Meeting Preparation' },
];

function applyTemplate(template: string, keyword: string): string {
  return template.replace('{}', () => keyword);
}

/**
 * SuggestionEngine - Proposes new task titles from the keywords that recur
 * most often across existing task titles and descriptions.
 *
 * Holds no state between calls; every call reads a fresh snapshot from the
 * text source. Returns an empty list when there is nothing to mine, leaving
 * the fallback to the caller.
 */
export class SuggestionEngine {
  constructor(private readonly source: TaskTextSource) {}

  generateSuggestions(): TaskSuggestion[] {
    const titles = this.source.listTitles();
    if (titles.length === 0) {
      // Descriptions are not consulted without at least one title.
      return [];
    }

    const keywords: string[] = [];
    for (const title of titles) {
      keywords.push(...extractKeywords(title));
    }
    for (const description of this.source.listDescriptions()) {
      keywords.push(...extractKeywords(description));
    }

    if (keywords.length === 0) {
      log(LogLevel.DEBUG, `SuggestionEngine: No keywords found in ${titles.length} task titles`);
      return [];
    }

    const topKeywords = rankKeywords(keywords, DEFAULT_KEYWORD_LIMIT);
    const suggestions: TaskSuggestion[] = [];
    const generatedTitles = new Set<string>();

    for (const keyword of topKeywords) {
      const formattedKeyword = formatKeyword(keyword);
      let madeForKeyword = 0;

      for (const template of SUGGESTION_TEMPLATES) {
        if (madeForKeyword >= MAX_SUGGESTIONS_PER_KEYWORD) {
          break;
        }

        const suggestedTitle = applyTemplate(template, formattedKeyword);
        if (!generatedTitles.has(suggestedTitle)) {
          suggestions.push({ suggested_title: suggestedTitle });
          generatedTitles.add(suggestedTitle);
          madeForKeyword++;
        }
      }
    }

    log(LogLevel.DEBUG, `SuggestionEngine: Generated ${suggestions.length} suggestions from keywords: ${topKeywords.join(', ')}`);
    return suggestions;
  }
}
