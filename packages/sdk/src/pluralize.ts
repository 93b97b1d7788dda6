/**
 * Plural forms of attribute names, at runtime and at the type level
 *
 * Rules, applied in order:
 * 1. ends in "s": unchanged
 * 2. ends in consonant + "y": "y" becomes "ies"
 * 3. ends in "sh", "ch", "x" or "z": append "es"
 * 4. otherwise: append "s"
 */

const VOWELS = "aeiou";

type Vowel = "a" | "e" | "i" | "o" | "u" | "A" | "E" | "I" | "O" | "U";

export type Pluralize<W extends string> = W extends `${string}s`
  ? W
  : W extends `${infer Stem}y`
    ? Stem extends "" | `${string}${Vowel}`
      ? `${W}s`
      : `${Stem}ies`
    : W extends `${string}${"sh" | "ch" | "x" | "z"}`
      ? `${W}es`
      : `${W}s`;

export function pluralize(word: string): string {
  if (word.endsWith("s")) {
    return word;
  }
  if (word.endsWith("y") && word.length > 1 && !VOWELS.includes(word[word.length - 2].toLowerCase())) {
    return word.slice(0, -1) + "ies";
  }
  if (word.endsWith("sh") || word.endsWith("ch") || word.endsWith("x") || word.endsWith("z")) {
    return word + "es";
  }
  return word + "s";
}
