/**
 * Shell-style wildcard matching for attachment filenames.
 *
 * `*` matches any run of characters (slashes included), `?` one character,
 * `[seq]` one character from the set (ranges allowed) and `[!seq]` one
 * character outside it. An unclosed `[` is a literal. Matching is
 * case-insensitive and anchored at both ends.
 */

const compiled = new Map<string, RegExp>();

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

function escapeLiteral(ch: string): string {
  return ch.replace(REGEX_SPECIALS, "\\$&");
}

function escapeClassChar(ch: string): string {
  return /[\\\]\[^-]/.test(ch) ? `\\${ch}` : ch;
}

/**
 * Translate a bracket expression body (without the brackets) to a regex
 * fragment. Reversed ranges such as `z-a` match nothing.
 */
function translateClass(body: string): string {
  let negate = false;
  let i = 0;
  if (body.startsWith("!")) {
    negate = true;
    i = 1;
  }

  let members = "";
  while (i < body.length) {
    const ch = body.charAt(i);
    const next = body[i + 1];
    const end = body[i + 2];
    if (next === "-" && end !== undefined) {
      if (ch <= end) {
        members += `${escapeClassChar(ch)}-${escapeClassChar(end)}`;
      }
      i += 3;
    } else {
      members += escapeClassChar(ch);
      i += 1;
    }
  }

  if (members === "") {
    // `[!]`-style sets: negated empty matches any char, plain empty nothing
    return negate ? "." : "(?!)";
  }
  return negate ? `[^${members}]` : `[${members}]`;
}

/**
 * Compile a wildcard pattern into an anchored regular expression.
 */
export function compileWildcard(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    i += 1;

    if (ch === "*") {
      // Collapse runs of stars
      while (pattern[i] === "*") i += 1;
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      let j = i;
      if (pattern[j] === "!") j += 1;
      if (pattern[j] === "]") j += 1;
      while (j < pattern.length && pattern[j] !== "]") j += 1;

      if (j >= pattern.length) {
        source += "\\[";
      } else {
        source += translateClass(pattern.slice(i, j));
        i = j + 1;
      }
    } else {
      source += escapeLiteral(ch);
    }
  }

  const regex = new RegExp(`^${source}$`, "is");
  compiled.set(pattern, regex);
  return regex;
}

/**
 * Test a filename against a wildcard pattern, ignoring case.
 */
export function matchesWildcard(name: string, pattern: string): boolean {
  return compileWildcard(pattern.toLowerCase()).test(name.toLowerCase());
}
