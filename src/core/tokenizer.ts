import {encode} from 'gpt-tokenizer'

/** Any consistent subword tokenizer; only the length of the encoding is used. */
export interface Tokenizer {
  encode(text: string): readonly number[]
}

export const bpeTokenizer: Tokenizer = {
  encode(text) {
    return encode(text, {allowedSpecial: 'all'})
  }
}

export function countTokens(tokenizer: Tokenizer, text: string): number {
  return tokenizer.encode(text).length
}
