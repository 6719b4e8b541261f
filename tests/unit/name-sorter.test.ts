import { describe, it, expect, vi } from 'vitest';
import { NameSorter, sortNames } from '../../src/processing/name-sorter.js';
import { createVocabulary } from '../../src/processing/vocabulary.js';
import type { ILogger } from '../../src/utils/logger.js';

function createMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('NameSorter', () => {
  it('sorts a chapter listing and substitutes the narrator once', () => {
    const text = [
      'Characters:',
      'Esgeril',
      'Colonel Authand',
      'Pene',
      'Narrator',
      'The Protagonist',
      'Settings:',
      'Cafeteria (interior)',
      'Lake (exterior)',
      'Lake',
    ].join('\n');

    expect(sortNames(text, 'Kalia')).toEqual({
      Characters: ['Esgeril', 'Colonel Authand', 'Pene', 'Kalia'],
      Settings: ['Cafeteria (interior)', 'Lake (exterior)', 'Lake'],
    });
  });

  it('drops narrator placeholders when no narrator is given', () => {
    expect(sortNames('Characters:\nBob\nthe main character')).toEqual({
      Characters: ['Bob'],
      Settings: [],
    });
  });

  it('merges spelling variants into the longer form', () => {
    expect(sortNames("Characters:\nJon\nJonathan\nJon's")).toEqual({
      Characters: ['Jonathan'],
      Settings: [],
    });
  });

  it('keeps the titled form of a name', () => {
    expect(sortNames('Characters:\nCaptain Ahab\nAhab')).toEqual({
      Characters: ['Captain Ahab'],
      Settings: [],
    });
  });

  it('merges distinct names sharing a first word', () => {
    // accepted false positive of the "shorter is alias" rule
    expect(sortNames('Characters:\nAnna Smith\nAnna Li')).toEqual({
      Characters: ['Anna Smith'],
      Settings: [],
    });
  });

  it('repairs glued headers, list markers and location prefixes', () => {
    const text = [
      '1. Characters: Bob, Ann; Carl',
      'Settings:',
      'interior: Kitchen, Hall',
      '- Exterior (Garden)',
      'Weapon:',
      'Sword',
      'Weapons:',
      'Bow',
    ].join('\n');

    expect(sortNames(text)).toEqual({
      Characters: ['Bob', 'Ann', 'Carl'],
      Settings: ['Kitchen (interior)', 'Hall (interior)', 'Garden (exterior)'],
      Weapons: ['Sword', 'Bow'],
    });
  });

  it('drops filler candidates and stray parentheticals', () => {
    const text = 'Characters:\nHe\nUnknown stranger\nBob (mentioned)\nSettings:\nHall (interior';

    expect(sortNames(text)).toEqual({
      Characters: ['Bob'],
      Settings: ['Hall interior'],
    });
  });

  it('maps location headers to Settings', () => {
    expect(sortNames('Locations:\nPier')).toEqual({
      Characters: [],
      Settings: ['Pier'],
    });
  });

  it('ignores filler headers and their text', () => {
    expect(sortNames('Characters:\nBob\nNote: all names are guesses')).toEqual({
      Characters: ['Bob'],
      Settings: [],
    });
  });

  it('returns an empty mapping for blank input', () => {
    expect(sortNames('')).toEqual({});
    expect(sortNames('  \n\n\t')).toEqual({});
  });

  it('always includes the base categories', () => {
    expect(sortNames('Characters:')).toEqual({ Characters: [], Settings: [] });
  });

  it('logs and drops names listed before any header', () => {
    const logger = createMockLogger();
    const sorter = new NameSorter({ logger });

    expect(sorter.sort('Bob\nCharacters:\nAnn')).toEqual({ Characters: ['Ann'], Settings: [] });
    expect(logger.debug).toHaveBeenCalledWith('Dropping name listed before any category header', { name: 'Bob' });
  });

  it('uses the injected vocabulary', () => {
    const sorter = new NameSorter({ vocabulary: createVocabulary({ narratorAliases: ['hero'] }) });

    expect(sorter.sort('Characters:\nThe Hero\nNarrator', 'Mia')).toEqual({
      Characters: ['Mia', 'Narrator'],
      Settings: [],
    });
  });

  describe('parseLine', () => {
    const sorter = new NameSorter();

    it('splits a glued header from its names', () => {
      expect(sorter.parseLine('Characters: Bob, Ann')).toEqual({ header: 'Characters', candidates: ['Bob', 'Ann'] });
    });

    it('re-tags location prefixed lists', () => {
      expect(sorter.parseLine('Exterior: Dock, Pier')).toEqual({ candidates: ['Dock (exterior)', 'Pier (exterior)'] });
    });

    it('returns null for blank or punctuation-only lines', () => {
      expect(sorter.parseLine('   ')).toBeNull();
      expect(sorter.parseLine('---')).toBeNull();
    });
  });
});
