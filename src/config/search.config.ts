import { registerAs } from '@nestjs/config';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : Number(raw);
}

// Falls back when the value is missing or not a positive integer
function readPositiveInt(name: string, fallback: number): number {
  const value = readInt(name, fallback);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export default registerAs('search', () => ({
  // Number of ranked result lists kept in the LRU cache; rejected by the cache when invalid
  cacheCapacity: readInt('SEARCH_CACHE_CAPACITY', 100),
  defaultTopK: readPositiveInt('SEARCH_DEFAULT_TOP_K', 10),
  defaultSuggestLimit: readPositiveInt('SEARCH_DEFAULT_SUGGEST_LIMIT', 10),
}));
