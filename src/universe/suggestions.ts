import { distance as editDistance } from "fastest-levenshtein";

/**
 * Ranked "did you mean" suggestions for misspelled point names. The
 * orchestrator only depends on {@link SuggestionProvider}; hosts may plug any
 * similarity ranking they prefer.
 */
export interface SuggestionProvider {
  suggest(name: string, limit: number): string[];
}

export { distance as levenshteinDistance } from "fastest-levenshtein";

export interface LevenshteinSuggesterOptions {
  /**
   * Largest edit distance still worth suggesting, relative to the query
   * length. Defaults to 0.5 (half the characters may differ).
   */
  readonly maxRelativeDistance?: number;
}

/**
 * Builds a {@link SuggestionProvider} ranking candidate names by
 * case-insensitive edit distance, then alphabetically. Candidates starting
 * with the query are always kept so short prefixes still produce hints.
 */
export function createLevenshteinSuggester(
  names: Iterable<string>,
  options: LevenshteinSuggesterOptions = {},
): SuggestionProvider {
  const candidates = Array.from(names, (name) => ({ name, folded: name.toLowerCase() }));
  const maxRelative = options.maxRelativeDistance ?? 0.5;

  return {
    suggest(name: string, limit: number): string[] {
      if (limit <= 0) {
        return [];
      }
      const query = name.trim().toLowerCase();
      if (query.length === 0) {
        return [];
      }
      const threshold = Math.max(1, Math.ceil(query.length * maxRelative));

      return candidates
        .map((candidate) => ({
          name: candidate.name,
          distance: editDistance(query, candidate.folded),
          prefix: candidate.folded.startsWith(query),
        }))
        .filter((entry) => entry.distance <= threshold || entry.prefix)
        .sort((left, right) => left.distance - right.distance || left.name.localeCompare(right.name))
        .slice(0, limit)
        .map((entry) => entry.name);
    },
  };
}

/**
 * Renders the suggestion tail appended to unknown-name messages:
 * `. Did you mean 'X'?` or `. Did you mean one of: 'X', 'Y'?`.
 */
export function formatSuggestions(suggestions: readonly string[]): string {
  if (suggestions.length === 0) {
    return "";
  }
  if (suggestions.length === 1) {
    return `. Did you mean '${suggestions[0]}'?`;
  }
  return `. Did you mean one of: ${suggestions.map((entry) => `'${entry}'`).join(", ")}?`;
}
