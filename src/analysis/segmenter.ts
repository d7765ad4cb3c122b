// Stage 1: split raw text into sentences
import { SENTENCE_BOUNDARY } from './analysis.constants';

export const segment = (text: string): string[] =>
  text
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

// Code points, so CJK and astral characters count once each
export const charCount = (text: string): number => Array.from(text).length;
