/**
 * String similarity utilities for deduplication and line matching
 */

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(str1: string, str2: string): number {
  if (str1.length < str2.length) {
    return levenshteinDistance(str2, str1);
  }
  if (str2.length === 0) {
    return str1.length;
  }

  // Two-row variant of the distance matrix
  let previousRow = Array.from({ length: str2.length + 1 }, (_, j) => j);

  for (let i = 0; i < str1.length; i++) {
    const currentRow = [i + 1];
    for (let j = 0; j < str2.length; j++) {
      const insertion = previousRow[j + 1] + 1;
      const deletion = currentRow[j] + 1;
      const substitution = previousRow[j] + (str1[i] === str2[j] ? 0 : 1);
      currentRow.push(Math.min(insertion, deletion, substitution));
    }
    previousRow = currentRow;
  }

  return previousRow[str2.length];
}

/**
 * Normalized similarity: 1 - distance / max length.
 * Two empty strings are identical.
 */
export function levenshteinSimilarity(str1: string, str2: string): number {
  if (str1 === str2) return 1;

  const maxLength = Math.max(str1.length, str2.length);
  if (maxLength === 0) return 1;

  return 1 - levenshteinDistance(str1, str2) / maxLength;
}

/**
 * Remove spaces and upper-case, so "0909 w1d" and "0909W1D" compare equal
 */
export function compactText(text: string): string {
  return text.replace(/ /g, '').toUpperCase();
}

/**
 * Whether two line texts read the same, tolerating OCR noise
 */
export function areLineTextsSimilar(text1: string, text2: string, threshold = 0.8): boolean {
  if (text1 === text2) return true;

  const norm1 = compactText(text1);
  const norm2 = compactText(text2);
  if (norm1 === norm2) return true;

  // Too different in length to be the same line
  if (Math.abs(norm1.length - norm2.length) > Math.max(norm1.length, norm2.length) * 0.3) {
    return false;
  }

  return levenshteinSimilarity(norm1, norm2) >= threshold;
}
