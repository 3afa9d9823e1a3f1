import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

let cachedRoot: string | null = null;

/**
 * Locates the package root (the nearest directory holding package.json above
 * this module). Logs, templates and the .env file are resolved from here so the
 * tool behaves the same from src/ under tsx and from dist/ after a build.
 */
export function findPackageRoot(): string {
  if (cachedRoot) {
    return cachedRoot;
  }

  let currentDir = path.dirname(fileURLToPath(import.meta.url));
  let packageRoot = process.cwd();
  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      packageRoot = currentDir;
      break;
    }
    currentDir = path.dirname(currentDir);
  }

  cachedRoot = packageRoot;
  return packageRoot;
}
