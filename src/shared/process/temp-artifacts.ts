import { promises as fs } from 'fs';
import * as path from 'path';
import { hasErrorCode } from './errno';

/**
 * Delete every file in `tempDir` that belongs to one invocation
 * (`<invocationId>.<ext>`, including yt-dlp `.part` and `.ytdl` leftovers).
 *
 * @returns the names of the removed files
 */
export async function removeInvocationArtifacts(
  tempDir: string,
  invocationId: string,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(tempDir);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }

  const prefix = `${invocationId}.`;
  const owned = entries.filter((name) => name.startsWith(prefix));

  await Promise.all(owned.map((name) => fs.rm(path.join(tempDir, name), { force: true })));

  return owned;
}
