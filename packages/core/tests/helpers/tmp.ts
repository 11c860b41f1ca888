import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * Per-test scratch directory under the OS temp dir
 */
export function createScratchDir(): { dir: string; write: (name: string, content: string) => string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'trialkey-'));
  return {
    dir,
    write: (name, content) => {
      const path = join(dir, name);
      writeFileSync(path, content, 'utf8');
      return path;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
