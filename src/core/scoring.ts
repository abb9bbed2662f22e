// =========================================================
// HYPE SCORING — PROMOTIONAL INTENSITY OF A MESSAGE
// =========================================================

import { HypeBreakdown } from '../types';
import { EMOJI_CODEPOINT_FLOOR, HYPE_BONUS_CAPS, HYPE_KEYWORDS } from '../config/lexicon';

/**
 * Score a message's hype.
 *
 * score =
 *   sum of matched keyword weights (each keyword once)
 * + min(2 * count('!'), 10)
 * + min(emoji count, 5)
 * + min(3 * ALL-CAPS words longer than 2 chars, 15)
 *
 * Bonuses are capped so repetition cannot dominate the score.
 */
export function calculateHype(text: string): HypeBreakdown {
  const lower = text.toLowerCase();

  let keywordScore = 0;
  const matchedKeywords: string[] = [];
  for (const [keyword, weight] of HYPE_KEYWORDS) {
    if (lower.includes(keyword.toLowerCase())) {
      keywordScore += weight;
      matchedKeywords.push(keyword);
    }
  }

  const punctuationBonus = Math.min(countChar(text, '!') * 2, HYPE_BONUS_CAPS.punctuation);
  const emojiBonus = Math.min(countEmoji(text), HYPE_BONUS_CAPS.emoji);
  const capsBonus = Math.min(countCapsWords(text) * 3, HYPE_BONUS_CAPS.caps);

  return {
    keywordScore,
    matchedKeywords,
    punctuationBonus,
    emojiBonus,
    capsBonus,
    total: keywordScore + punctuationBonus + emojiBonus + capsBonus,
  };
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

function countEmoji(text: string): number {
  let count = 0;
  for (const c of text) {
    const codePoint = c.codePointAt(0);
    if (codePoint !== undefined && codePoint > EMOJI_CODEPOINT_FLOOR) count++;
  }
  return count;
}

/**
 * Words with at least one uppercase letter, no lowercase letters,
 * and more than two characters
 */
function countCapsWords(text: string): number {
  return text
    .split(/\s+/)
    .filter(word => [...word].length > 2 && /\p{Lu}/u.test(word) && !/\p{Ll}/u.test(word))
    .length;
}

/**
 * Format breakdown for display
 */
export function formatHype(hype: HypeBreakdown): string {
  return `Hype: ${hype.total} | ` +
    `Keywords: +${hype.keywordScore} [${hype.matchedKeywords.join(', ')}] | ` +
    `Punct: +${hype.punctuationBonus} | ` +
    `Emoji: +${hype.emojiBonus} | ` +
    `Caps: +${hype.capsBonus}`;
}
