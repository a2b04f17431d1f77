/**
 * Single-pass confusion correction applied inside the filter pipeline.
 *
 * Rules run in order, each seeing the output of the previous one. This is
 * lighter than the ConfusionCorrector: no candidate search, no grammar ranking.
 */

const LETTER = /\p{L}/u;
const DIGIT = /\p{Nd}/u;

/**
 * Letters commonly read in place of digits on engraved metal
 */
export const LETTER_TO_DIGIT: Readonly<Record<string, string>> = {
  O: '0',
  Q: '0',
  D: '0',
  I: '1',
  l: '1',
  Z: '2',
  A: '4',
  S: '5',
  G: '6',
  T: '7',
  B: '8',
  g: '9',
  q: '9',
};

export interface InlineCorrectionRule {
  readonly name: string;
  readonly when: (text: string) => boolean;
  readonly apply: (text: string) => string;
}

function isLetter(char: string | undefined): boolean {
  return char !== undefined && LETTER.test(char);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && DIGIT.test(char);
}

function shareOf(text: string, predicate: (char: string) => boolean): number {
  const chars = [...text];
  if (chars.length === 0) return 0;
  return chars.filter(predicate).length / chars.length;
}

export function isMostlyLetters(text: string): boolean {
  return shareOf(text, isLetter) > 0.6;
}

export function isMostlyDigits(text: string): boolean {
  return shareOf(text, isDigit) > 0.6;
}

/**
 * Wheel serials: "AT" followed by digits, seven characters or more
 */
export function hasSerialPrefix(text: string): boolean {
  return text.length >= 7 && text.startsWith('AT');
}

function toDigit(char: string): string {
  return LETTER_TO_DIGIT[char] ?? char;
}

export const INLINE_CORRECTION_RULES: readonly InlineCorrectionRule[] = [
  {
    name: 'letters-dominant',
    when: isMostlyLetters,
    apply: (text) => text.replace(/0/g, 'O').replace(/1/g, 'I').replace(/5/g, 'S'),
  },
  {
    name: 'digits-dominant',
    when: isMostlyDigits,
    apply: (text) => text.replace(/O/g, '0').replace(/I/g, '1'),
  },
  {
    name: 'serial-prefix',
    when: hasSerialPrefix,
    apply: (text) => {
      const chars = [...text];
      for (let i = 2; i < chars.length; i++) {
        if (isLetter(chars[i])) {
          chars[i] = toDigit(chars[i]);
        }
      }
      return chars.join('');
    },
  },
  {
    name: 'digit-flanked',
    when: (text) => !hasSerialPrefix(text) && /^[A-Z0-9]{3,}$/.test(text),
    apply: (text) => {
      // Left to right over the array being rewritten, so a converted
      // character counts as a digit for its right-hand neighbour
      const chars = [...text];
      for (let i = 0; i < chars.length; i++) {
        if (isLetter(chars[i]) && isDigit(chars[i - 1]) && isDigit(chars[i + 1])) {
          chars[i] = toDigit(chars[i]);
        }
      }
      return chars.join('');
    },
  },
];

/**
 * Run every applicable rule in order and return the rewritten text
 */
export function applyInlineCorrection(
  text: string,
  rules: readonly InlineCorrectionRule[] = INLINE_CORRECTION_RULES
): string {
  let corrected = text;
  for (const rule of rules) {
    if (rule.when(corrected)) {
      corrected = rule.apply(corrected);
    }
  }
  return corrected;
}
