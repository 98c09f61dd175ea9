import path from 'path';
import micromatch from 'micromatch';

/**
 * Path helpers shared by the registry and the coalescer. Relative paths are
 * posix-style and relative to a root's fspath; the root itself is `''`.
 */

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Path of `target` relative to `base`, or null when it lies outside
 */
export function relativeTo(base: string, target: string): string | null {
  const relative = path.relative(base, target);
  if (relative === '') {
    return '';
  }
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return toPosixPath(relative);
}

/**
 * Proper ancestors of a relative path, outermost first: `a/b/c` → `a`, `a/b`
 */
export function ancestorsOf(relativePath: string): string[] {
  const parts = relativePath.split('/').filter((part) => part.length > 0);
  const ancestors: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    ancestors.push(parts.slice(0, i).join('/'));
  }
  return ancestors;
}

export function isDescendantOf(candidate: string, ancestor: string): boolean {
  if (ancestor === '') {
    return candidate !== '';
  }
  return candidate.startsWith(`${ancestor}/`);
}

export type IgnoreMatcher = (relativePath: string) => boolean;

/**
 * A path is ignored when it, or any directory above it, matches one of the
 * globs.
 */
export function createIgnoreMatcher(patterns: readonly string[]): IgnoreMatcher {
  if (patterns.length === 0) {
    return () => false;
  }
  const globs = [...patterns];
  return (relativePath) => {
    if (relativePath === '') {
      return false;
    }
    return [...ancestorsOf(relativePath), relativePath].some((candidate) =>
      micromatch.isMatch(candidate, globs, { dot: true })
    );
  };
}
