const LIKE_SPECIAL_CHARACTERS = /[\\%_~]/g;

export const escapeLikeValue = (value: string): string =>
  value.replace(LIKE_SPECIAL_CHARACTERS, '\\$&');

// Всегда поиск по вхождению: пользовательские % и _ экранируются
export const toContainsPattern = (value: string): string =>
  `%${escapeLikeValue(value)}%`;

const REGEXP_SPECIAL_CHARACTERS = /[.*+?^${}()|[\]\\/]/g;

/**
 * LIKE-шаблон (экранирование обратным слешем, `%` и `_`)
 * в регулярное выражение на всю строку.
 */
export const likePatternToRegExp = (
  pattern: string,
  caseInsensitive = false,
): RegExp => {
  let source = '';

  for (let index = 0; index < pattern.length; index++) {
    const char = pattern[index];

    if (char === '\\' && index + 1 < pattern.length) {
      index++;
      source += pattern[index].replace(REGEXP_SPECIAL_CHARACTERS, '\\$&');
    } else if (char === '%') {
      source += '[\\s\\S]*';
    } else if (char === '_') {
      source += '[\\s\\S]';
    } else {
      source += char.replace(REGEXP_SPECIAL_CHARACTERS, '\\$&');
    }
  }

  return new RegExp(`^${source}$`, caseInsensitive ? 'i' : '');
};
