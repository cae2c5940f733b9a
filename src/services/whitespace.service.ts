export const ASCII_WHITESPACE = ' \t\n\r\x0b\x0c';

export const OBSCURE_ZERO_WIDTH_WHITESPACE =
  '\u180E' + // Mongolian vowel separator
  '\u200B' + // zero width space
  '\u200C' + // zero width non-joiner
  '\u200D' + // zero width joiner
  '\u2060' + // word joiner
  '\uFEFF'; // zero width no-break space

export const OBSCURE_FULL_WIDTH_WHITESPACE = '\u00A0\u202F';

export const ALL_WHITESPACE =
  ASCII_WHITESPACE + OBSCURE_ZERO_WIDTH_WHITESPACE + OBSCURE_FULL_WIDTH_WHITESPACE;

const OBSCURE_WHITESPACE = new Set(OBSCURE_ZERO_WIDTH_WHITESPACE + OBSCURE_FULL_WIDTH_WHITESPACE);

function stripCharacters(value: string, characters: string): string {
  const strip = new Set(characters);
  let start = 0;
  let end = value.length;

  while (start < end && strip.has(value[start])) start++;
  while (end > start && strip.has(value[end - 1])) end--;

  return value.slice(start, end);
}

/**
 * Removes invisible characters spreadsheets leave behind, then trims
 */
export function stripAndRemoveObscureWhitespace(value: string): string {
  if (value === '') {
    return value;
  }

  const visible = [...value].filter((character) => !OBSCURE_WHITESPACE.has(character)).join('');
  return stripCharacters(visible, ASCII_WHITESPACE);
}

/**
 * Trims every kind of whitespace, plus any extra characters, from both ends
 */
export function stripAllWhitespace(value: string, extraCharacters = ''): string {
  return stripCharacters(value, ALL_WHITESPACE + extraCharacters);
}

export function removeCharacters(value: string, characters: string): string {
  const remove = new Set(characters);
  return [...value].filter((character) => !remove.has(character)).join('');
}
