/**
 * Slipway Kernel — Ignore Patterns
 *
 * dockerignore-style matching for the source copy and the build-context
 * digest. Both must apply the same rules, otherwise a file that is never
 * copied could still invalidate the source layer.
 *
 * Syntax:
 * - `*`   any run of characters within one path segment
 * - `?`   one character within one path segment
 * - `**`  any number of segments, including zero when followed by a slash
 * - `!p`  re-include paths matched by an earlier pattern
 *
 * Patterns are anchored at the context root. A pattern that matches a
 * directory excludes everything beneath it. The last matching pattern wins.
 */

interface CompiledPattern {
  readonly negate: boolean;
  readonly regex: RegExp;
}

function normalizePath(path: string): string {
  let p = path.replace(/\\/g, '/');
  while (p.startsWith('./')) p = p.slice(2);
  p = p.replace(/^\/+/, '').replace(/\/+$/, '');
  return p === '.' ? '' : p;
}

/** Convert one glob pattern to an anchored regular expression. */
export function globToRegExp(pattern: string): RegExp {
  const p = normalizePath(pattern);
  let re = '';
  let i = 0;
  while (i < p.length) {
    const c = p.charAt(i);
    if (c === '*') {
      if (p.charAt(i + 1) === '*') {
        if (p.charAt(i + 2) === '/') {
          re += '(?:.*/)?';
          i += 3;
        } else {
          re += '.*';
          i += 2;
        }
        continue;
      }
      re += '[^/]*';
    } else if (c === '?') {
      re += '[^/]';
    } else {
      re += c.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
    i++;
  }
  return new RegExp(`^${re}$`);
}

function compile(patterns: ReadonlyArray<string>): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const raw of patterns) {
    const trimmed = raw.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    const negate = trimmed.startsWith('!');
    const body = normalizePath(negate ? trimmed.slice(1) : trimmed);
    if (body === '') continue;
    compiled.push({ negate, regex: globToRegExp(body) });
  }
  return compiled;
}

/**
 * Build a predicate answering whether a context-relative path is ignored.
 */
export function createIgnoreMatcher(patterns: ReadonlyArray<string>): (path: string) => boolean {
  const compiled = compile(patterns);
  return (path: string): boolean => {
    const normalized = normalizePath(path);
    if (normalized === '') return false;

    // The path itself and every ancestor directory are candidates.
    const segments = normalized.split('/');
    const candidates: string[] = [];
    for (let i = 1; i <= segments.length; i++) {
      candidates.push(segments.slice(0, i).join('/'));
    }

    let ignored = false;
    for (const { negate, regex } of compiled) {
      if (candidates.some((c) => regex.test(c))) {
        ignored = !negate;
      }
    }
    return ignored;
  };
}

export function isIgnored(patterns: ReadonlyArray<string>, path: string): boolean {
  return createIgnoreMatcher(patterns)(path);
}
