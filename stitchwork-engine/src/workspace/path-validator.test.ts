import { describe, it, expect } from 'vitest';
import { isPathBlocked, matchGlob, normalizeDirectory, validateWorkspacePath } from './path-validator.js';
import { DEFAULT_BLOCKED_PATHS } from './types.js';

describe('validateWorkspacePath', () => {
  it('normalizes relative paths', () => {
    expect(validateWorkspacePath('./src//a.ts')).toEqual({ valid: true, normalizedPath: 'src/a.ts' });
    expect(validateWorkspacePath('src\\lib\\b.ts').normalizedPath).toBe('src/lib/b.ts');
    expect(validateWorkspacePath('src/x/../c.ts').normalizedPath).toBe('src/c.ts');
  });

  it('rejects absolute paths and escapes', () => {
    expect(validateWorkspacePath('/etc/passwd')).toEqual({
      valid: false,
      error: 'Absolute paths are not allowed: /etc/passwd',
    });
    expect(validateWorkspacePath('../secret').valid).toBe(false);
    expect(validateWorkspacePath('a/../../secret').error).toBe('Path escapes workspace root: a/../../secret');
  });

  it('rejects empty and directory-only paths', () => {
    expect(validateWorkspacePath('').valid).toBe(false);
    expect(validateWorkspacePath('a\0b').valid).toBe(false);
    expect(validateWorkspacePath('.').error).toBe('Path does not name a file: .');
  });

  it('applies blocked patterns after normalization', () => {
    expect(validateWorkspacePath('./.git/config', DEFAULT_BLOCKED_PATHS)).toEqual({
      valid: false,
      error: "Path '.git/config' is blocked in workspaces",
    });
    expect(validateWorkspacePath('config/.env.local', DEFAULT_BLOCKED_PATHS).valid).toBe(false);
    expect(validateWorkspacePath('src/environment.ts', DEFAULT_BLOCKED_PATHS).valid).toBe(true);
  });
});

describe('matchGlob', () => {
  it('matches single and double stars', () => {
    expect(matchGlob('src/a.ts', 'src/*.ts')).toBe(true);
    expect(matchGlob('src/lib/a.ts', 'src/*.ts')).toBe(false);
    expect(matchGlob('src/lib/a.ts', 'src/**')).toBe(true);
    expect(matchGlob('keys/server.pem', '**/*.pem')).toBe(true);
    expect(matchGlob('server.pem', '**/*.pem')).toBe(true);
    expect(matchGlob('a1.ts', 'a?.ts')).toBe(true);
  });

  it('checks a path against several patterns', () => {
    expect(isPathBlocked('id.key', DEFAULT_BLOCKED_PATHS)).toBe(true);
    expect(isPathBlocked('src/index.ts', DEFAULT_BLOCKED_PATHS)).toBe(false);
  });
});

describe('normalizeDirectory', () => {
  it('maps root spellings to the empty prefix', () => {
    expect(normalizeDirectory('')).toBe('');
    expect(normalizeDirectory('.')).toBe('');
    expect(normalizeDirectory('/')).toBe('');
  });

  it('adds a trailing separator', () => {
    expect(normalizeDirectory('src/')).toBe('src/');
    expect(normalizeDirectory('./src/lib')).toBe('src/lib/');
    expect(normalizeDirectory('../up')).toBeNull();
  });
});
