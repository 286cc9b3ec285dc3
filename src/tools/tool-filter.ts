const escapeRegex = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Shell-style wildcard: *, ?, [seq], [!seq]. Case-sensitive, whole-name match.
export const globToRegex = (pattern: string): RegExp => {
  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    i += 1;
    if (ch === '*') { out += '.*'; continue; }
    if (ch === '?') { out += '.'; continue; }
    if (ch !== '[') { out += escapeRegex(ch); continue; }
    let j = i;
    if (j < pattern.length && pattern[j] === '!') j += 1;
    if (j < pattern.length && pattern[j] === ']') j += 1;
    while (j < pattern.length && pattern[j] !== ']') j += 1;
    if (j >= pattern.length) {
      // unterminated class is a literal '['
      out += '\\[';
      continue;
    }
    let body = pattern.slice(i, j).replace(/\\/g, '\\\\');
    i = j + 1;
    if (body.startsWith('!')) body = `^${body.slice(1)}`;
    else if (body.startsWith('^')) body = `\\${body}`;
    out += `[${body}]`;
  }
  return new RegExp(`^${out}$`, 's');
};

export const compileToolPatterns = (patterns: readonly string[]): RegExp[] => patterns.map((p) => globToRegex(p));

export function matchesAnyPattern(name: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((re) => re.test(name));
}

/**
 * Keep only the items whose name matches one of `patterns`.
 * `undefined` patterns mean no filtering; an empty list allows nothing.
 */
export function filterByPatterns<T extends { name: string }>(items: readonly T[], patterns: readonly string[] | undefined): T[] {
  if (patterns === undefined) return [...items];
  const compiled = compileToolPatterns(patterns);
  return items.filter((item) => matchesAnyPattern(item.name, compiled));
}
