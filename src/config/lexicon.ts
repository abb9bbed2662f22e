// =========================================================
// HYPE LEXICON — WEIGHTED PROMOTIONAL KEYWORDS
// =========================================================

/**
 * Matched case-insensitively as substrings; each entry counts at most once per message.
 */
export const HYPE_KEYWORDS: ReadonlyArray<readonly [string, number]> = [
  ['launch', 10],
  ['presale', 10],
  ['stealth launch', 15],
  ['fair launch', 12],
  ['moon', 8],
  ['100x', 10],
  ['1000x', 12],
  ['gem', 7],
  ['alpha', 9],
  ['call', 8],
  ['pump', 6],
  ['bullish', 5],
  ['buy now', 7],
  ['entry', 6],
  ['degen', 5],
  ['CA:', 15],
  ['contract', 12],
  ['0x', 10],
];

export const HYPE_BONUS_CAPS = {
  punctuation: 10,
  emoji: 5,
  caps: 15,
};

/**
 * Code points above this count as emoji
 */
export const EMOJI_CODEPOINT_FLOOR = 127000;

export const ADDRESS_PATTERNS = {
  ethereum: /0x[a-fA-F0-9]{40}/,
  solana: /[1-9A-HJ-NP-Za-km-z]{32,44}/,
};
