import { syllable } from "syllable";

export type ReadabilityIndex = (text: string) => number;

export type TextStatistics = {
  readonly words: number;
  readonly sentences: number;
  readonly syllables: number;
};

const WORD_PATTERN = /[\p{L}\p{N}]/u;
const SENTENCE_PATTERN = /[^.!?]+[.!?]*/gu;

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/u).filter((token) => WORD_PATTERN.test(token));
}

export function countSentences(text: string): number {
  let sentences = 0;
  for (const match of text.matchAll(SENTENCE_PATTERN)) {
    if (splitWords(match[0]).length > 0) {
      sentences += 1;
    }
  }
  return Math.max(1, sentences);
}

export function countSyllables(word: string): number {
  return Math.max(1, syllable(word));
}

export function computeTextStatistics(text: string): TextStatistics {
  const words = splitWords(text);
  let syllables = 0;
  for (const word of words) {
    syllables += countSyllables(word);
  }
  return {
    words: words.length,
    sentences: countSentences(text),
    syllables,
  };
}

/**
 * Flesch reading ease, rounded to two decimals. Not bounded to [0, 100]: very short words push it
 * above 100 and dense prose drives it negative. Text without words scores 206.835.
 */
export function fleschReadingEase(text: string): number {
  const stats = computeTextStatistics(text);
  if (stats.words === 0) {
    return 206.835;
  }
  const wordsPerSentence = stats.words / stats.sentences;
  const syllablesPerWord = stats.syllables / stats.words;
  return roundTo(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord, 2);
}
