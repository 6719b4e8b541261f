import { describe, it, expect } from 'vitest';
import { parseAttributeMarkdown } from '../../src/processing/markdown-attributes.js';

describe('parseAttributeMarkdown', () => {
  it('reads categories, names and attributes from headings', () => {
    const markdown = [
      '# Characters',
      '## **Bob**',
      '### Appearance',
      '- tall',
      '- *scarred*',
      '### Personality',
      'gruff',
      '## Ann',
      '- Personality: quiet',
      '- Age: 30',
      '- no colon here',
      '# Settings',
      '## Dock (exterior)',
      '### Weather',
      '1. rain',
    ].join('\n');

    expect(parseAttributeMarkdown(markdown)).toEqual({
      Characters: {
        Bob: { Appearance: ['tall', 'scarred'], Personality: 'gruff' },
        Ann: { Personality: 'quiet', Age: '30' },
      },
      Settings: {
        'Dock (exterior)': { Weather: 'rain' },
      },
    });
  });

  it('merges repeated attribute headings', () => {
    const markdown = '# Characters\n## Bob\n### Looks\n- tall\n### Looks\n- scarred\n## Bob\n- Looks: bald';

    expect(parseAttributeMarkdown(markdown)).toEqual({
      Characters: { Bob: { Looks: ['tall', 'scarred', 'bald'] } },
    });
  });

  it('ignores names without a category', () => {
    expect(parseAttributeMarkdown('## Bob\n### Looks\n- tall')).toEqual({});
  });

  it('handles Windows line endings', () => {
    expect(parseAttributeMarkdown('# Items\r\n## Sword\r\n### Owner\r\nBob\r\n')).toEqual({
      Items: { Sword: { Owner: 'Bob' } },
    });
  });

  it('reads prototype member names as ordinary names', () => {
    expect(parseAttributeMarkdown('# Characters\n## constructor\n- Job: mason')).toEqual({
      Characters: { constructor: { Job: 'mason' } },
    });
  });

  it('ignores the lines under a __proto__ heading', () => {
    const markdown = '# Characters\n## Bob\n- Job: baker\n## __proto__\n- Job: thief\n### Looks\n- tall';

    expect(parseAttributeMarkdown(markdown)).toEqual({
      Characters: { Bob: { Job: 'baker' } },
    });
  });

  it('returns an empty mapping for empty input', () => {
    expect(parseAttributeMarkdown('')).toEqual({});
  });
});
