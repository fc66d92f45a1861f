import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the separator artifact keys use on every platform.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins path segments and normalizes the result to forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * A platform-agnostic version of `path.dirname`.
 */
export function dirname(p: string): string {
  return normalizePath(path.dirname(p));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * True when `p` is a non-empty relative path that does not start with a separator.
 */
export function isRelativeArtifactPath(p: string): boolean {
  if (p.trim().length === 0) return false;
  if (p.startsWith('/') || p.startsWith('\\')) return false;
  return !/^[A-Za-z]:[\\/]/.test(p);
}

/**
 * True when `p` stays below the directory it is resolved against.
 */
export function staysWithinRoot(p: string): boolean {
  if (!isRelativeArtifactPath(p)) return false;
  return !normalizePath(p)
    .split('/')
    .some((segment) => segment === '..');
}
