/**
 * Path Validator
 *
 * Workspace paths are normalized, workspace-relative POSIX paths. Anything
 * that would escape the workspace root, or that matches a blocked pattern,
 * is refused.
 */

import * as path from 'path';

export interface PathValidationResult {
  valid: boolean;
  normalizedPath?: string;
  error?: string;
}

/**
 * Simple glob matching (supports *, ** and ?)
 */
export function matchGlob(target: string, pattern: string): boolean {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*\/?/g, '\u0000')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/\u0000/g, '(?:.*/)?.*');

  return new RegExp(`^${regexPattern}$`).test(target);
}

export function isPathBlocked(relativePath: string, blockedPaths: readonly string[]): boolean {
  return blockedPaths.some((pattern) => matchGlob(relativePath, pattern));
}

/**
 * Normalize a workspace path. Leading "./" and duplicate separators are
 * dropped; absolute paths and ".." escapes are invalid.
 */
export function validateWorkspacePath(
  targetPath: string,
  blockedPaths: readonly string[] = []
): PathValidationResult {
  if (!targetPath || targetPath.includes('\0')) {
    return { valid: false, error: 'Path is empty or contains NUL bytes' };
  }

  const posixPath = targetPath.replace(/\\/g, '/');
  if (path.posix.isAbsolute(posixPath)) {
    return { valid: false, error: `Absolute paths are not allowed: ${targetPath}` };
  }

  const normalizedPath = path.posix.normalize(posixPath).replace(/\/+$/, '');
  if (normalizedPath === '..' || normalizedPath.startsWith('../')) {
    return { valid: false, error: `Path escapes workspace root: ${targetPath}` };
  }
  if (normalizedPath === '.' || normalizedPath === '') {
    return { valid: false, error: `Path does not name a file: ${targetPath}` };
  }

  if (isPathBlocked(normalizedPath, blockedPaths)) {
    return { valid: false, error: `Path '${normalizedPath}' is blocked in workspaces` };
  }

  return { valid: true, normalizedPath };
}

/**
 * Normalize a directory prefix for listings; '' means the workspace root.
 */
export function normalizeDirectory(dir: string): string | null {
  if (!dir || dir === '.' || dir === './' || dir === '/') return '';
  const result = validateWorkspacePath(dir);
  return result.valid && result.normalizedPath ? `${result.normalizedPath}/` : null;
}
