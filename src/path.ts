import { fileURLToPath } from 'url';

const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:(\/\/)?/;

/**
 * Turns an editor document URI into a local path.
 *
 * `file:///var/log/test.txt` becomes `/var/log/test.txt`, and on Windows
 * `file:///C:/path/to/file.txt` becomes `C:\path\to\file.txt`. Anything that
 * is not a local file URI just loses its scheme and authority marker.
 */
export function normalizePath(uri: string): string {
  try {
    return fileURLToPath(uri);
  } catch {
    return uri.replace(SCHEME_PREFIX, '');
  }
}
