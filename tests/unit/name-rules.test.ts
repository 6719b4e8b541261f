import { describe, it, expect } from 'vitest';
import {
  chooseCanonical,
  comparisonForm,
  isSimilarKey,
  locationTag,
  prioritizeKeys,
  shouldCompareNames,
  stripTitles,
  toSingular,
} from '../../src/processing/name-rules.js';
import { createVocabulary } from '../../src/processing/vocabulary.js';

const vocabulary = createVocabulary();

describe('stripTitles', () => {
  it('drops leading titles and articles', () => {
    expect(stripTitles('Colonel Authand', vocabulary)).toBe('Authand');
    expect(stripTitles('The Captain Ahab', vocabulary)).toBe('Ahab');
    expect(stripTitles('Dr. Watson', vocabulary)).toBe('Watson');
  });

  it('keeps a name made only of titles', () => {
    expect(stripTitles('Captain', vocabulary)).toBe('Captain');
    expect(stripTitles('The Captain', vocabulary)).toBe('Captain');
  });
});

describe('toSingular', () => {
  it.each([
    ['Wolves', 'wolf'],
    ['cities', 'city'],
    ['heroes', 'hero'],
    ['glasses', 'glass'],
    ['boxes', 'box'],
    ['Weapons', 'weapon'],
    ['glass', 'glass'],
    ['Alice', 'alice'],
  ])('%s -> %s', (word, singular) => {
    expect(toSingular(word, vocabulary)).toBe(singular);
  });
});

describe('locationTag', () => {
  it('reads trailing interior/exterior tags', () => {
    expect(locationTag('Lake (exterior)')).toBe('exterior');
    expect(locationTag('Cafeteria (Interior)')).toBe('interior');
    expect(locationTag('Lake')).toBeNull();
  });
});

describe('comparisonForm', () => {
  it('removes possessives, titles and punctuation', () => {
    expect(comparisonForm("Jon's", vocabulary)).toBe('jon');
    expect(comparisonForm('Captain Ahab!', vocabulary)).toBe('ahab');
    expect(comparisonForm('Lake (exterior)', vocabulary)).toBe('lake');
  });
});

describe('shouldCompareNames', () => {
  it('compares a name with its prefix', () => {
    expect(shouldCompareNames('Jon', 'Jonathan', vocabulary)).toBe(true);
  });

  it('never compares tagged and untagged locations', () => {
    expect(shouldCompareNames('Lake', 'Lake (exterior)', vocabulary)).toBe(false);
    expect(shouldCompareNames('Lake (interior)', 'Lake (exterior)', vocabulary)).toBe(false);
  });

  it('compares singular and plural forms', () => {
    expect(shouldCompareNames('Wolf', 'Wolves', vocabulary)).toBe(true);
  });

  it('leaves unrelated names apart', () => {
    expect(shouldCompareNames('Bob', 'Alice', vocabulary)).toBe(false);
  });

  // Accepted false positives of the shared-prefix rule
  it('treats distinct names with a shared first word as comparable', () => {
    expect(shouldCompareNames('Anna Smith', 'Anna Li', vocabulary)).toBe(true);
    expect(shouldCompareNames('Al', 'Alice', vocabulary)).toBe(true);
  });
});

describe('chooseCanonical', () => {
  it('keeps the longer spelling', () => {
    expect(chooseCanonical('Jon', 'Jonathan', vocabulary)).toBe('Jonathan');
    expect(chooseCanonical('Jonathan', 'Jon', vocabulary)).toBe('Jonathan');
  });

  it('prefers the plural', () => {
    expect(chooseCanonical('Wolf', 'Wolves', vocabulary)).toBe('Wolves');
    expect(chooseCanonical('Wolves', 'Wolf', vocabulary)).toBe('Wolves');
  });

  it('prefers the titled form of the same name', () => {
    expect(chooseCanonical('Ahab', 'Captain Ahab', vocabulary)).toBe('Captain Ahab');
  });
});

describe('isSimilarKey', () => {
  it('matches a bare title to the titled name', () => {
    expect(isSimilarKey('The Captain', 'Captain Ahab', vocabulary)).toBe(true);
  });

  it('matches singular and plural keys', () => {
    expect(isSimilarKey('Dragons', 'dragon', vocabulary)).toBe(true);
  });

  it('matches keys that differ only by a title', () => {
    expect(isSimilarKey('Mr. Smith', 'Smith', vocabulary)).toBe(true);
  });

  it('keeps the narrator placeholders distinct', () => {
    expect(isSimilarKey('The Narrator', 'Main Character', vocabulary)).toBe(false);
  });

  it('never matches differently tagged settings', () => {
    expect(isSimilarKey('The Lake', 'Lake (exterior)', vocabulary)).toBe(false);
    expect(isSimilarKey('Lake (interior)', 'Lake (exterior)', vocabulary)).toBe(false);
  });

  it('does not merge plain prefixes', () => {
    expect(isSimilarKey('Bob', 'Bobby', vocabulary)).toBe(false);
  });
});

describe('prioritizeKeys', () => {
  it('keeps the longer key', () => {
    expect(prioritizeKeys('The Captain', 'Captain Ahab')).toEqual({ keep: 'Captain Ahab', drop: 'The Captain' });
  });

  it('breaks ties by key order', () => {
    expect(prioritizeKeys('Bob', 'Ann')).toEqual({ keep: 'Ann', drop: 'Bob' });
  });
});
