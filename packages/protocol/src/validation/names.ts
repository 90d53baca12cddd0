// Name predicates for heroes and monsters

const HERO_NAME_CHARACTERS = /^[A-Za-z' :]+$/;
const COLON_WITHOUT_SPACE = /:(?! )/;
const MAX_HERO_APOSTROPHES = 2;

/**
 * A hero name starts with a capital, uses only letters, spaces,
 * apostrophes (at most two) and colons, and every colon is followed
 * by a space.
 */
export function isValidHeroName(name: string): boolean {
  if (!/^[A-Z]/.test(name)) return false;
  if (!HERO_NAME_CHARACTERS.test(name)) return false;
  if ((name.match(/'/g) ?? []).length > MAX_HERO_APOSTROPHES) return false;
  return !COLON_WITHOUT_SPACE.test(name);
}

/**
 * A monster name starts with a capital and uses only letters,
 * spaces and apostrophes.
 */
export function isValidMonsterName(name: string): boolean {
  return /^\p{Lu}[\p{L} ']*$/u.test(name);
}
