import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const SERVICE_NAME = 'question-review-service';

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Reported by /healthz and the CLI's --version.
 *
 * Uses import.meta.url for path resolution so it works from both
 * src/version.ts (tsx, vitest) and dist/src/version.js (built).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    for (const relative of ['../package.json', '../../package.json']) {
      const pkgPath = fileURLToPath(new URL(relative, import.meta.url));
      if (!existsSync(pkgPath)) continue;
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    return '0.0.0';
  })();
