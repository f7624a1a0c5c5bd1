import { StandardTokenizer } from './standard-tokenizer';

describe('StandardTokenizer', () => {
  let tokenizer: StandardTokenizer;

  beforeEach(() => {
    tokenizer = new StandardTokenizer();
  });

  it('should be defined', () => {
    expect(tokenizer).toBeDefined();
    expect(tokenizer.getName()).toBe('standard');
  });

  it('should lowercase and split on non-word characters', () => {
    expect(tokenizer.tokenize('Hello world, this is a test.')).toEqual([
      'hello',
      'world',
      'this',
      'is',
      'a',
      'test',
    ]);
  });

  it('should keep digits and underscores inside tokens', () => {
    expect(tokenizer.tokenize('route_66 opened in 1926!')).toEqual([
      'route_66',
      'opened',
      'in',
      '1926',
    ]);
  });

  it('should treat hyphens and apostrophes as delimiters', () => {
    expect(tokenizer.tokenize("state-of-the-art isn't")).toEqual([
      'state',
      'of',
      'the',
      'art',
      'isn',
      't',
    ]);
  });

  it('should keep letters from other scripts', () => {
    expect(tokenizer.tokenize('Café Ünïcode')).toEqual(['café', 'ünïcode']);
  });

  it('should handle empty input', () => {
    expect(tokenizer.tokenize('')).toEqual([]);
    expect(tokenizer.tokenize('  ...  !!! ')).toEqual([]);
  });

  it('should reproduce its own output when re-tokenizing joined tokens', () => {
    const tokens = tokenizer.tokenize('Apple PIE -- recipe #2, (dessert)');
    expect(tokens).toEqual(['apple', 'pie', 'recipe', '2', 'dessert']);
    expect(tokenizer.tokenize(tokens.join(' '))).toEqual(tokens);
  });
});
