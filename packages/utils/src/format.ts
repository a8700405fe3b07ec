/**
 * Text and number formatting shared by the table shapers.
 */

const MAGNITUDE_SUFFIXES = [' ', 'K', 'M', 'B', 'T', 'P'] as const;

const TAG_PATTERN = /<[^>]*>/g;

/**
 * Upper-case the first character and lower-case the rest ("first_name" -> "First_name")
 */
export function capitalize(value: string): string {
  if (value.length === 0) return value;
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Title-case every alphabetic run, so letters after `_`, digits or spaces start a new word
 */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => capitalize(word));
}

/**
 * "equivalent_price_per_token_in_usd" -> "Equivalent Price Per Token In Usd"
 */
export function replaceUnderscores(value: string): string {
  return titleCase(value).replace(/_/g, ' ');
}

/**
 * "avatar_url" -> "Avatar Url". Unlike {@link replaceUnderscores}, only `_` splits words.
 */
export function prettifyColumnName(value: string): string {
  return value
    .split('_')
    .map((word) => capitalize(word))
    .join(' ');
}

export function stripTags(value: string): string {
  return value.replace(TAG_PATTERN, '');
}

/**
 * Compact a large number with a magnitude suffix: 21000000 -> "21 M", 1234567 -> "1.235 M".
 *
 * Strings holding an integer are formatted too; any other string is returned untouched.
 */
export function formatLargeNumber(
  value: number | string | null | undefined,
  decimals: number = 3
): string | null {
  if (value === null || value === undefined) return null;

  let num: number;
  if (typeof value === 'string') {
    if (!/^-?\d+$/.test(value)) return value;
    num = Number(value);
  } else {
    num = value;
  }

  if (!Number.isFinite(num)) return String(num);

  let magnitude = 0;
  while (Math.abs(num) >= 1000 && magnitude < MAGNITUDE_SUFFIXES.length - 1) {
    magnitude += 1;
    num /= 1000;
  }

  const numStr = Number.isInteger(num) ? String(num) : num.toFixed(decimals);
  return `${numStr} ${MAGNITUDE_SUFFIXES[magnitude]}`.trim();
}
