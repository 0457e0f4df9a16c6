import type { Charset } from '../charset/charset.js';
import type {
  ChildEnqueue,
  ExpansionOptions,
  ExpansionResult,
} from './types.js';

const PRIMARY_BRANCH_OFFSET = 5;
const SPECIAL_BRANCH_OFFSET = 10;

function branchPriority(prefix: string, char: string, charset: Charset): number {
  const offset =
    charset.tierOf(char) === 'special'
      ? SPECIAL_BRANCH_OFFSET
      : PRIMARY_BRANCH_OFFSET;

  return prefix.length + offset;
}

function enumerateAll(prefix: string, charset: Charset): ChildEnqueue[] {
  return charset.characters.map((char) => ({
    prefix: prefix + char,
    priority: branchPriority(prefix, char, charset),
    reason: 'fallback' as const,
  }));
}

/**
 * Decides what a page of suggestions for `prefix` tells us.
 *
 * A page shorter than `maxResults` is complete. A full page is sorted, so
 * every branch below the character that follows `prefix` in its last name is
 * already fully listed: only that pivot branch and the branches after it can
 * hold unseen names.
 */
export function expandPrefix(
  prefix: string,
  suggestions: readonly string[],
  options: ExpansionOptions,
): ExpansionResult {
  const { maxResults, charset } = options;
  const names = [...suggestions];

  if (suggestions.length < maxResults) {
    return { names, children: [] };
  }

  const lastName = suggestions[suggestions.length - 1];
  if (
    lastName === undefined ||
    lastName.length <= prefix.length ||
    !lastName.startsWith(prefix)
  ) {
    return { names, children: enumerateAll(prefix, charset) };
  }

  const pivot = lastName.charAt(prefix.length);
  if (!charset.has(pivot)) {
    return { names, children: enumerateAll(prefix, charset) };
  }

  const children: ChildEnqueue[] = [
    { prefix: prefix + pivot, priority: prefix.length, reason: 'pivot' },
  ];

  for (const char of charset.after(pivot)) {
    children.push({
      prefix: prefix + char,
      priority: branchPriority(prefix, char, charset),
      reason: 'sibling',
    });
  }

  return { names, children };
}

export { PRIMARY_BRANCH_OFFSET, SPECIAL_BRANCH_OFFSET };
