export interface Tokenizer {
  /**
   * Tokenize the input text into an array of tokens
   * @param text The text to tokenize
   * @returns Array of tokens, in the order they appear
   */
  tokenize(text: string): string[];

  /**
   * Get the name of the tokenizer
   */
  getName(): string;
}
