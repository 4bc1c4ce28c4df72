/**
 * .env loading
 *
 * Imported first by every entry point so variables are in process.env
 * before any other module reads them. Candidates, first found wins:
 *   1. DOCCHAT_ENV_FILE (explicit override)
 *   2. CWD/.env (project-local)
 *   3. Package root/.env (development)
 *
 * @module server/env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Nearest ancestor of this module holding a package.json
 */
function findPackageRoot(): string | null {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function loadEnvFile(): string | null {
  const packageRoot = findPackageRoot();
  const envCandidates = [
    process.env.DOCCHAT_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    packageRoot ? path.join(packageRoot, '.env') : undefined,
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}

loadEnvFile();
