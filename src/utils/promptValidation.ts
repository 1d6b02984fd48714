/**
 * Content checks for prompt text, applied on top of the length limits.
 */

const BLOCKED_PATTERNS: readonly RegExp[] = [
  /<script.*?<\/script>/i,
  /javascript:/i,
  /vbscript:/i,
  /onload=/i,
  /onerror=/i,
  /eval\(/i,
  /exec\(/i,
  /import\s+os/i,
  /import\s+subprocess/i,
  /__import__/i,
  /\$\{.*\}/,
  /\{\{.*\}\}/,
  /<\?php.*\?>/i,
  /<%.*%>/,
  /UNION\s+SELECT/i,
  /DROP\s+TABLE/i,
  /\/\*.*\*\//,
  /--/,
];

const SUSPICIOUS_CHARACTERS = new Set(['<', '>', '{', '}', '$', '%', ';', '|', '&']);
const MAX_SUSPICIOUS_CHARACTERS = 10;

const PLAIN_PUNCTUATION = new Set([' ', '.', ',', '!', '?', '-']);
const MAX_SPECIAL_CHARACTER_RATIO = 0.3;

const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

/**
 * Returns why a prompt is refused, or null when it is acceptable.
 */
export function findPromptProblem(prompt: string): string | null {
  if (BLOCKED_PATTERNS.some((pattern) => pattern.test(prompt))) {
    return 'contains blocked content (script, template or SQL syntax)';
  }

  const characters = Array.from(prompt);
  if (characters.length === 0) {
    return null;
  }

  const suspicious = characters.filter((char) => SUSPICIOUS_CHARACTERS.has(char)).length;
  if (suspicious > MAX_SUSPICIOUS_CHARACTERS) {
    return `contains too many of the characters ${Array.from(SUSPICIOUS_CHARACTERS).join(' ')}`;
  }

  const special = characters.filter((char) => !LETTER_OR_DIGIT.test(char) && !PLAIN_PUNCTUATION.has(char)).length;
  if (special / characters.length > MAX_SPECIAL_CHARACTER_RATIO) {
    return 'is mostly special characters';
  }

  return null;
}
