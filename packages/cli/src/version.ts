import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJson = z.object({ version: z.string().min(1) });

/** Nearest package.json above this module, in sources and in the compiled tree alike */
function readPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return PackageJson.parse(JSON.parse(readFileSync(candidate, 'utf-8'))).version;
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

export const TOOL_NAME = 'edge-debug';
export const VERSION: string = readPackageVersion();
