import { constants, promises as fs } from 'fs';
import * as path from 'path';
import treeKill from 'tree-kill';
import { hasErrorCode } from './errno';

/**
 * What tree-kill spawns to list a process's children. It attaches no error
 * handler to that spawn, so a missing binary surfaces as an uncaught
 * exception and the callback never runs.
 */
const CHILD_LISTERS: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'ps',
  darwin: 'pgrep',
};

async function isOnPath(command: string): Promise<boolean> {
  const directories = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  const found = await Promise.all(
    directories.map((directory) =>
      fs.access(path.join(directory, command), constants.X_OK).then(
        () => true,
        () => false,
      ),
    ),
  );
  return found.includes(true);
}

function signalProcess(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(pid, signal);
  } catch (error) {
    if (!hasErrorCode(error, 'ESRCH')) throw error;
  }
}

/**
 * Kill a process and all of its descendants. Resolves when the signal has
 * been delivered, or when the process was already gone.
 *
 * Without the platform's process lister only `pid` itself is signalled.
 */
export async function killProcessTree(
  pid: number,
  signal: NodeJS.Signals = 'SIGKILL',
): Promise<void> {
  const lister = CHILD_LISTERS[process.platform];
  if (lister !== undefined && !(await isOnPath(lister))) {
    signalProcess(pid, signal);
    return;
  }

  await new Promise<void>((resolve, reject) => {
    treeKill(pid, signal, (error) => {
      if (!error || hasErrorCode(error, 'ESRCH')) {
        resolve();
        return;
      }
      reject(error);
    });
  });
}
