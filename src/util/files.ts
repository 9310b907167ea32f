import { stat, unlink } from 'node:fs/promises';
import { isErrno } from './snapshot-file.js';

/** Size in bytes, or null when the path does not exist. */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch (error) {
    if (isErrno(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Unlinks a file and resolves to the bytes freed, or null when there was
 * nothing to remove.
 */
export async function removeFile(filePath: string): Promise<number | null> {
  const size = await fileSize(filePath);
  if (size === null) return null;
  try {
    await unlink(filePath);
  } catch (error) {
    if (isErrno(error) && error.code === 'ENOENT') return null;
    throw error;
  }
  return size;
}
