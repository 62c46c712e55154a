import { extractKeywords, formatKeyword, rankKeywords } from './keywords';

describe('extractKeywords', () => {
  it('should lowercase and strip punctuation', () => {
    expect(extractKeywords('Plan the Q3 Report!!')).toEqual(['plan', 'report']);
  });

  it('should return the same tokens for the same input', () => {
    const text = 'Plan the Q3 Report!!';
    expect(extractKeywords(text)).toEqual(extractKeywords(text));
  });

  it('should drop stop words and tokens of two characters or fewer', () => {
    expect(extractKeywords('the and has had a an it')).toEqual([]);
  });

  it('should return an empty list for empty or absent text', () => {
    expect(extractKeywords('')).toEqual([]);
    expect(extractKeywords(null)).toEqual([]);
    expect(extractKeywords(undefined)).toEqual([]);
  });

  it('should keep duplicates in their original order', () => {
    expect(extractKeywords('Budget review: budget approval, BUDGET')).toEqual([
      'budget', 'review', 'budget', 'approval', 'budget',
    ]);
  });

  it('should split hyphenated words and keep underscores and digits', () => {
    expect(extractKeywords('follow-up on release_2024 (v100)')).toEqual(['follow', 'release_2024', 'v100']);
  });

  it('should treat accented letters as word characters', () => {
    expect(extractKeywords('Café menü')).toEqual(['café', 'menü']);
  });

  it('should count length in characters rather than UTF-16 units', () => {
    expect(extractKeywords('\u{20000}\u{20001} plan')).toEqual(['plan']);
    expect(extractKeywords('\u{20000}\u{20001}\u{20002}')).toEqual(['\u{20000}\u{20001}\u{20002}']);
  });

  it('should only filter exact stop words', () => {
    expect(extractKeywords('Theme hasty shoulder')).toEqual(['theme', 'hasty', 'shoulder']);
  });
});

describe('rankKeywords', () => {
  it('should order keywords by descending count', () => {
    expect(rankKeywords(['alpha', 'beta', 'beta', 'gamma', 'beta', 'gamma'])).toEqual(['beta', 'gamma', 'alpha']);
  });

  it('should break ties by first occurrence', () => {
    expect(rankKeywords(['zeta', 'alpha', 'alpha', 'zeta', 'mu'])).toEqual(['zeta', 'alpha', 'mu']);
  });

  it('should return at most five keywords by default', () => {
    const keywords = ['one', 'two', 'three', 'four', 'five', 'six', 'seven'];
    expect(rankKeywords(keywords)).toEqual(['one', 'two', 'three', 'four', 'five']);
  });

  it('should honour a custom limit', () => {
    expect(rankKeywords(['one', 'two', 'two'], 1)).toEqual(['two']);
  });

  it('should return an empty list for no keywords', () => {
    expect(rankKeywords([])).toEqual([]);
  });
});

describe('formatKeyword', () => {
  it('should capitalize a single word', () => {
    expect(formatKeyword('budget')).toBe('Budget');
  });

  it('should turn hyphenated parts into capitalized words', () => {
    expect(formatKeyword('project-plan')).toBe('Project Plan');
  });

  it('should upper-case a leading character outside the basic plane', () => {
    expect(formatKeyword('\u{10428}x-plan')).toBe('\u{10400}x Plan');
  });

  it('should leave the rest of each part unchanged', () => {
    expect(formatKeyword('iOS-app')).toBe('IOS App');
  });
});
