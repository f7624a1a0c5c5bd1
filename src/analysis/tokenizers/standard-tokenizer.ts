import { Tokenizer } from '../interfaces/tokenizer.interface';

// Letters, numbers and underscore, in any script.
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Lowercases the input and splits it into maximal runs of word characters.
 * Everything else is a delimiter and is dropped.
 */
export class StandardTokenizer implements Tokenizer {
  tokenize(text: string): string[] {
    if (!text) {
      return [];
    }

    return text.toLowerCase().match(WORD_PATTERN) ?? [];
  }

  getName(): string {
    return 'standard';
  }
}
