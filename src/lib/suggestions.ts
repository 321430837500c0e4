import type { FailureModeSuggestion } from "@/lib/types";

const MAX_SUGGESTIONS = 5;

/** Open code given to the annotation created only to anchor a failure-mode link. */
export const PLACEHOLDER_OPEN_CODE = "(failure mode tagged without a note)";

/** True for notes a labeler actually wrote. */
export function isWrittenNote(openCode: string) {
  return openCode !== PLACEHOLDER_OPEN_CODE;
}

export function slugify(value: string) {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function titleCase(word: string) {
  return `${word.charAt(0).toUpperCase()}${word.slice(1)}`;
}

/**
 * Proposes failure-mode names from the most frequent words (four letters or
 * more) across an email's open codes. Ties keep first-seen order.
 */
export function suggestFailureModes(
  openCodes: string[],
  limit = MAX_SUGGESTIONS
): FailureModeSuggestion[] {
  const counts = new Map<string, number>();

  openCodes.forEach((openCode) => {
    const tokens = openCode.toLowerCase().match(/[a-z]{4,}/g) ?? [];
    tokens.forEach((token) => {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    });
  });

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => ({
      display_name: titleCase(word),
      slug: word,
      definition: `Auto-suggested from frequent token '${word}'`,
    }));
}
