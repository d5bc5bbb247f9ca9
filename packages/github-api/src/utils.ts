export interface SearchTerms {
  name?: string;
  company?: string;
  role?: string;
  location?: string;
}

/**
 * Collapse whitespace and strip quotes so a term cannot break out of the
 * search syntax.
 */
export function normalizeTerm(input: string): string {
  return input
    .replace(/["\\]/g, "") // quotes and backslashes
    .replace(/[\x00-\x1F\x7F]/g, " ") // control chars
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Build a /search/users query: free-text terms in order, then an optional
 * `location:` qualifier (quoted when it contains spaces).
 *
 * @example
 * buildSearchQuery({ company: "Acme", role: "engineer", location: "New York" });
 * // 'Acme engineer location:"New York"'
 */
export function buildSearchQuery(terms: SearchTerms): string {
  const parts = [terms.name, terms.company, terms.role]
    .map((t) => (t ? normalizeTerm(t) : ""))
    .filter((t) => t.length > 0);

  const location = terms.location ? normalizeTerm(terms.location) : "";
  if (location) {
    parts.push(location.includes(" ") ? `location:"${location}"` : `location:${location}`);
  }

  return parts.join(" ");
}
