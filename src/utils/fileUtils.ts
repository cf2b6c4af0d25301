/**
 * File helpers
 *
 * @fileoverview Path expansion and readability checks
 * @since 0.1.0
 */

import { accessSync, constants, statSync } from 'fs';
import { homedir, userInfo } from 'os';
import path from 'path';

/**
 * Expand a leading `~` or `~<current user>` to the home directory.
 *
 * Paths naming another user's home are returned unchanged.
 *
 * @example
 * expandUser('~/.my.cnf'); // '/home/me/.my.cnf'
 */
export function expandUser(filePath: string): string {
  if (!filePath.startsWith('~')) {
    return filePath;
  }

  const slash = filePath.indexOf('/');
  const prefix = slash === -1 ? filePath : filePath.slice(0, slash);
  const rest = slash === -1 ? '' : filePath.slice(slash + 1);
  const name = prefix.slice(1);

  if (name !== '' && name !== currentUserName()) {
    return filePath;
  }

  return rest === '' ? homedir() : path.join(homedir(), rest);
}

/**
 * Whether `filePath` is a regular file the process may read.
 */
export function isReadableFile(filePath: string): boolean {
  try {
    if (!statSync(filePath).isFile()) {
      return false;
    }
    accessSync(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function currentUserName(): string {
  try {
    return userInfo().username;
  } catch {
    // no passwd entry for the uid
    return '';
  }
}
