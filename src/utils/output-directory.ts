import * as fs from 'fs';
import * as path from 'path';

/**
 * Create the results directory and, when asked, unlink the regular files
 * directly inside it. Subdirectories are left alone.
 *
 * @returns the number of files removed
 */
export function prepareOutputDirectory(outputDirectory: string, deletePreviousResults: boolean): number {
  fs.mkdirSync(outputDirectory, { recursive: true, mode: 0o755 });
  if (!deletePreviousResults) {
    return 0;
  }

  let removed = 0;
  for (const entry of fs.readdirSync(outputDirectory)) {
    const entryPath = path.join(outputDirectory, entry);
    // stat follows symlinks; a dangling link resolves to nothing and stays
    const stats = fs.statSync(entryPath, { throwIfNoEntry: false });
    if (stats?.isFile()) {
      fs.unlinkSync(entryPath);
      removed++;
    }
  }
  return removed;
}
