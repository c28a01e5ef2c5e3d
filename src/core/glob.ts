// Glob subset for allow-lists:
// - "**/" => zero or more directories
// - "**"  => anything, across separators
// - "*"   => anything within one segment
// - "?"   => one character within a segment
// A pattern without a slash (e.g. "*.md") only matches at the repository root.

const cache = new Map<string, RegExp>();

export function globToRegExp(glob: string): RegExp {
  const cached = cache.get(glob);
  if (cached) return cached;

  const g = glob.replace(/\\/g, '/').replace(/^\.\//, '');
  let re = '^';
  for (let i = 0; i < g.length; i++) {
    const c = g.charAt(i);
    if (c === '*') {
      if (g.charAt(i + 1) === '*') {
        if (g.charAt(i + 2) === '/') {
          re += '(?:.*/)?';
          i += 2;
        } else {
          re += '.*';
          i += 1;
        }
      } else {
        re += '[^/]*';
      }
    } else if (c === '?') {
      re += '[^/]';
    } else {
      re += c.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  re += '$';

  const compiled = new RegExp(re);
  cache.set(glob, compiled);
  return compiled;
}

export function matchesGlob(relPath: string, glob: string): boolean {
  return globToRegExp(glob).test(relPath.replace(/\\/g, '/').replace(/^\.\//, ''));
}

export function matchesAny(relPath: string, globs: readonly string[]): boolean {
  return globs.some((g) => matchesGlob(relPath, g));
}
