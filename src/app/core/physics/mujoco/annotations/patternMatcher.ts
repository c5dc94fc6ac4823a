import { logDebug } from "../../../services/logger";
import { descendants, formatAttributes, getAttribute, type XmlAttributes, type XmlElement } from "../../../xml/xmlTree";

const SCOPE = "annotations";
const WILDCARD = "*";

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

const patternCache = new Map<string, RegExp>();

/**
 * Shell-style glob to an anchored RegExp: `*` any run, `?` one character,
 * `[seq]` / `[!seq]` character classes. An unterminated `[` is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = patternCache.get(pattern);
  if (cached) return cached;

  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    i += 1;
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      let j = i;
      if (j < pattern.length && pattern[j] === "!") j += 1;
      if (j < pattern.length && pattern[j] === "]") j += 1;
      while (j < pattern.length && pattern[j] !== "]") j += 1;
      if (j >= pattern.length) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i, j).replace(/\\/g, "\\\\").replace(/]/g, "\\]");
      if (body.startsWith("!")) body = `^${body.slice(1)}`;
      else if (body.startsWith("^")) body = `\\${body}`;
      source += `[${body}]`;
      i = j + 1;
    } else {
      source += escapeRegExp(ch);
    }
  }

  const regex = new RegExp(`^${source}$`, "s");
  patternCache.set(pattern, regex);
  return regex;
}

export const hasWildcard = (pattern: string) => pattern.includes(WILDCARD);

/** Exact comparison unless the pattern contains `*`, in which case glob semantics apply. */
export function matchesPattern(value: string, pattern: string): boolean {
  if (!hasWildcard(pattern)) return value === pattern;
  return globToRegExp(pattern).test(value);
}

export function elementMatches(element: XmlElement, tag: string, constraints: XmlAttributes): boolean {
  if (element.tag !== tag) return false;
  for (const [name, pattern] of Object.entries(constraints)) {
    const value = getAttribute(element, name);
    if (value === undefined) return false;
    if (!matchesPattern(value, pattern)) return false;
  }
  return true;
}

/**
 * Every element below `scope` whose tag equals `tag` and whose attributes satisfy all
 * constraints. An empty result is a normal outcome, never an error.
 */
export function findMatchingElements(scope: XmlElement, tag: string, constraints: XmlAttributes): XmlElement[] {
  const wildcard = Object.values(constraints).some(hasWildcard);
  const matches = descendants(scope).filter((candidate) => elementMatches(candidate, tag, constraints));

  if (wildcard) {
    for (const match of matches) {
      logDebug(`Matched pattern <${tag} ${formatAttributes(constraints)}> with <${tag} ${formatAttributes(match.attrs)}>`, {
        scope: SCOPE,
      });
    }
  }
  logDebug(`Found ${matches.length} element(s) for pattern <${tag} ${formatAttributes(constraints)}>`, {
    scope: SCOPE,
    data: { within: scope.tag },
  });
  return matches;
}

/** Like `findMatchingElements`, but every constrained attribute must equal its value; `*` is literal. */
export function findExactMatches(scope: XmlElement, tag: string, attrs: XmlAttributes): XmlElement[] {
  return descendants(scope).filter(
    (candidate) =>
      candidate.tag === tag && Object.entries(attrs).every(([name, value]) => getAttribute(candidate, name) === value)
  );
}
