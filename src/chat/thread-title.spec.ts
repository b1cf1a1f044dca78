import {
  DEFAULT_THREAD_TITLE,
  deriveThreadTitle,
  resolveThreadTitle,
} from './thread-title';

describe('deriveThreadTitle', () => {
  it('should keep the first six words', () => {
    expect(deriveThreadTitle('how do I  rotate the\nlogs on a busy server')).toBe(
      'how do I rotate the logs',
    );
  });

  it('should cut long titles to 50 characters', () => {
    const title = deriveThreadTitle(
      'supercalifragilisticexpialidocious antidisestablishmentarianism words',
    );

    expect(title).toBe('supercalifragilisticexpialidocious antidisestab...');
    expect(title).toHaveLength(50);
  });

  it('should fall back to the default title for blank messages', () => {
    expect(deriveThreadTitle('   ')).toBe(DEFAULT_THREAD_TITLE);
  });
});

describe('resolveThreadTitle', () => {
  it('should prefer an explicit title', () => {
    expect(resolveThreadTitle('  Billing  ', 'hello there')).toBe('Billing');
  });

  it('should derive a title when none is given', () => {
    expect(resolveThreadTitle(undefined, 'hello there')).toBe('hello there');
    expect(resolveThreadTitle('', 'hello there')).toBe('hello there');
  });
});
