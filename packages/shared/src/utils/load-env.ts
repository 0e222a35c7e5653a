/**
 * Utility to load .env file from project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find project root by looking for .env file
 * Starts from current module location and goes up
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from project root .env file
 */
export function loadEnvFromRoot(): void {
  const moduleDir = dirname(fileURLToPath(import.meta.url));

  // packages/shared/src/utils -> project root
  const projectRoot = findProjectRoot(moduleDir);

  if (projectRoot) {
    dotenv.config({ path: join(projectRoot, '.env') });
  } else {
    // Fallback: try current working directory
    dotenv.config();
  }
}
