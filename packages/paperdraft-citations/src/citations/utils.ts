import { createHash } from 'node:crypto';

/** Derives `<prefix>_<16 hex chars>` from the non-empty parts, so equal inputs always get the same id. */
export const makeStableId = (parts: Array<string | null | undefined>, prefix: string): string => {
  const value = parts.filter(Boolean).join('|');
  const digest = createHash('sha1').update(value).digest('hex').slice(0, 16);
  return `${prefix}_${digest}`;
};

export const splitAuthors = (author: string): string[] =>
  author
    .split(/\s*;\s*|\s+and\s+|\s*&\s*/)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
