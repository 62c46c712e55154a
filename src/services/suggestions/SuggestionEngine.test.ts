import * as keywords from './keywords';
import { MAX_SUGGESTIONS_PER_KEYWORD, SuggestionEngine } from './SuggestionEngine';
import { TaskTextSource } from '../../types/task';

jest.mock('../../logger');

function createSource(titles: string[], descriptions: string[] = []): jest.Mocked<TaskTextSource> {
  return {
    listTitles: jest.fn().mockReturnValue(titles),
    listDescriptions: jest.fn().mockReturnValue(descriptions),
  };
}

function titlesOf(engine: SuggestionEngine): string[] {
  return engine.generateSuggestions().map((suggestion) => suggestion.suggested_title);
}

describe('SuggestionEngine', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('generateSuggestions', () => {
    it('should return nothing and skip descriptions when there are no titles', () => {
      const source = createSource([], ['quarterly budget planning']);
      const engine = new SuggestionEngine(source);

      expect(engine.generateSuggestions()).toEqual([]);
      expect(source.listDescriptions).not.toHaveBeenCalled();
    });

    it('should return nothing when no text yields a keyword', () => {
      const engine = new SuggestionEngine(createSource(['Do it', 'Go to it!'], ['a an of']));

      expect(engine.generateSuggestions()).toEqual([]);
    });

    it('should rank the most frequent keyword first and stop at three templates', () => {
      const engine = new SuggestionEngine(createSource([
        'Prepare budget report',
        'Prepare budget report',
        'Review budget numbers',
      ]));

      const titles = titlesOf(engine);

      expect(titles.slice(0, 3)).toEqual([
        'Follow-up on Budget',
        'Finalize Budget',
        'Plan next steps for Budget',
      ]);
      expect(titles).not.toContain('Schedule meeting for Budget');
    });

    it('should break count ties by first occurrence across titles then descriptions', () => {
      const engine = new SuggestionEngine(createSource([
        'Prepare budget report',
        'Prepare budget report',
        'Review budget numbers',
      ]));

      const titles = titlesOf(engine);

      expect(titles).toHaveLength(15);
      expect(titles[3]).toBe('Follow-up on Prepare');
      expect(titles[6]).toBe('Follow-up on Report');
      expect(titles[9]).toBe('Follow-up on Review');
      expect(titles[12]).toBe('Follow-up on Numbers');
    });

    it('should mine descriptions after titles', () => {
      const engine = new SuggestionEngine(createSource(['Do it'], ['Send invoice', 'Invoice reminder']));

      expect(titlesOf(engine)).toEqual([
        'Follow-up on Invoice',
        'Finalize Invoice',
        'Plan next steps for Invoice',
        'Follow-up on Send',
        'Finalize Send',
        'Plan next steps for Send',
        'Follow-up on Reminder',
        'Finalize Reminder',
        'Plan next steps for Reminder',
      ]);
    });

    it('should use only the top five keywords', () => {
      const engine = new SuggestionEngine(createSource(['alpha beta gamma delta epsilon zeta']));

      const titles = titlesOf(engine);

      expect(titles).toHaveLength(15);
      expect(titles.some((title) => title.endsWith('Zeta'))).toBe(false);
    });

    it('should produce identical results for the same snapshot', () => {
      const engine = new SuggestionEngine(createSource(
        ['Ship mobile release', 'Mobile QA pass'],
        ['Coordinate release notes with mobile team'],
      ));

      expect(engine.generateSuggestions()).toEqual(engine.generateSuggestions());
    });

    it('should never return duplicate titles or exceed the per-keyword quota', () => {
      const engine = new SuggestionEngine(createSource(
        ['Migrate database', 'Database backup', 'Backup rotation policy'],
        ['Review migration plan', 'Policy update for database access'],
      ));

      const titles = titlesOf(engine);

      expect(new Set(titles).size).toBe(titles.length);
      expect(titles.length).toBeLessThanOrEqual(15);
      for (const keyword of ['Database', 'Backup', 'Policy']) {
        const count = titles.filter((title) => title.endsWith(` ${keyword}`)).length;
        expect(count).toBeLessThanOrEqual(MAX_SUGGESTIONS_PER_KEYWORD);
      }
    });

    it('should skip titles already produced without spending the quota', () => {
      jest.spyOn(keywords, 'formatKeyword').mockReturnValue('Launch');
      const engine = new SuggestionEngine(createSource(['alpha beta gamma']));

      expect(titlesOf(engine)).toEqual([
        'Follow-up on Launch',
        'Finalize Launch',
        'Plan next steps for Launch',
        'Schedule meeting for Launch',
        'Prepare report regarding Launch',
        'Start working on Launch',
      ]);
    });

    it('should read a fresh snapshot on every call', () => {
      const source = createSource([]);
      const engine = new SuggestionEngine(source);

      expect(engine.generateSuggestions()).toEqual([]);

      source.listTitles.mockReturnValue(['Onboarding checklist']);
      expect(titlesOf(engine)[0]).toBe('Follow-up on Onboarding');
    });
  });
});
