import searchConfig from './search.config';

describe('searchConfig', () => {
  const keys = ['SEARCH_CACHE_CAPACITY', 'SEARCH_DEFAULT_TOP_K', 'SEARCH_DEFAULT_SUGGEST_LIMIT'];
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of keys) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of keys) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should use defaults when nothing is set', () => {
    expect(searchConfig()).toEqual({
      cacheCapacity: 100,
      defaultTopK: 10,
      defaultSuggestLimit: 10,
    });
  });

  it('should read valid values', () => {
    process.env.SEARCH_CACHE_CAPACITY = '25';
    process.env.SEARCH_DEFAULT_TOP_K = '5';
    process.env.SEARCH_DEFAULT_SUGGEST_LIMIT = '3';

    expect(searchConfig()).toEqual({ cacheCapacity: 25, defaultTopK: 5, defaultSuggestLimit: 3 });
  });

  it.each(['abc', '0', '-4', '2.5'])('should fall back to defaults for %p', (raw) => {
    process.env.SEARCH_DEFAULT_TOP_K = raw;
    process.env.SEARCH_DEFAULT_SUGGEST_LIMIT = raw;

    const config = searchConfig();
    expect(config.defaultTopK).toBe(10);
    expect(config.defaultSuggestLimit).toBe(10);
  });

  it('should pass an invalid capacity through for the cache to reject', () => {
    process.env.SEARCH_CACHE_CAPACITY = 'abc';

    expect(searchConfig().cacheCapacity).toBeNaN();
  });
});
