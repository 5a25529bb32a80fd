import path from 'path';
import { fileURLToPath } from 'url';
import type { ResourceLocator } from '../types';

/**
 * Resolve a locator to an absolute filesystem path.
 * Returns null for anything that is not local storage (http:, blob:, ...).
 */
export function resolveLocatorPath(locator: ResourceLocator, cwd: string = process.cwd()): string | null {
  if (locator instanceof URL) {
    return locator.protocol === 'file:' ? fileURLToPath(locator) : null;
  }

  const trimmed = locator.trim();
  if (trimmed === '') {
    return null;
  }

  if (trimmed.startsWith('file:')) {
    try {
      return fileURLToPath(trimmed);
    } catch {
      return null;
    }
  }

  // Schemes are two characters or more; `C:\clip.mp4` is a path
  if (/^[a-z][a-z0-9+.-]+:/i.test(trimmed)) {
    return null;
  }

  return path.resolve(cwd, trimmed);
}

export function describeLocator(locator: ResourceLocator): string {
  return locator instanceof URL ? locator.href : locator;
}
