// src/utils/text.ts

/**
 * Length in code points. `String#length` counts UTF-16 units, so an emoji
 * would count twice against a character limit.
 */
export function charCount(text: string): number {
  return Array.from(text).length;
}
