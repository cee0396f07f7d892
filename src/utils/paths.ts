import path from 'path';
import fs from 'fs-extra';

// Walk up from this file until a package.json is found; process.cwd() is only the last resort.
function findProjectRoot(startPath: string): string {
  let currentDir = startPath;
  while (currentDir !== path.parse(currentDir).root) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return process.cwd();
}

const PROJECT_ROOT = findProjectRoot(__dirname);

export function getProjectRoot(): string {
  return PROJECT_ROOT;
}

/**
 * Resolves a configured location against the project root.
 * Absolute inputs are returned unchanged.
 */
export function resolvePath(...segments: string[]): string {
  return path.resolve(PROJECT_ROOT, ...segments);
}

/**
 * Object keys and archive entries always use forward slashes, whatever the host OS.
 */
export function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Orders forward-slash paths the way a depth-first directory walk visits them:
 * names are compared one segment at a time, so `a/b.md` sorts before `a.md`.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}
