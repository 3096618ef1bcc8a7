/**
 * Path helpers for project-relative files.
 *
 * Config paths may be absolute or relative to the project root (the directory
 * holding stackctl.config.json, or the working directory when there is none).
 */

import { isAbsolute, join, normalize } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Resolves a config path into a filesystem path.
 *
 * If `p` is absolute, returns it normalized. Otherwise returns `join(root, p)`.
 */
export function resolveInProject(root: string, p: string): string {
  if (isAbsolute(p)) return normalize(p);
  return join(root, p.replace(/^[.][/]/, ''));
}

/**
 * Location of a bundled JSON schema. Works from both `src/lib` and `dist/lib`.
 */
export function bundledSchemaPath(fileName: string): string {
  return fileURLToPath(new URL(`../../schemas/${fileName}`, import.meta.url));
}
