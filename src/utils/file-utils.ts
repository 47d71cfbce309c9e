/**
 * File Utilities
 *
 * Output path helpers for saved BVH files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FILE_EXTENSIONS } from '../constants/config';

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Appends the .bvh extension unless present (case-insensitive).
 * Example: 'walk' -> 'walk.bvh', 'walk.' -> 'walk.bvh'
 */
export function ensureBvhExtension(fileName: string): string {
  if (fileName.toLowerCase().endsWith(FILE_EXTENSIONS.BVH)) {
    return fileName;
  }
  if (fileName.endsWith('.')) {
    return fileName + FILE_EXTENSIONS.BVH.substring(1);
  }
  return fileName + FILE_EXTENSIONS.BVH;
}

/**
 * Timestamped default file name
 * Example: 2024-03-05 14:07:09 -> 'motion-20240305140709.bvh'
 */
export function timestampFileName(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `motion-${stamp}${FILE_EXTENSIONS.BVH}`;
}

/**
 * Returns a path that does not exist yet by appending ' (n)' before the
 * extension. Example: 'take.bvh' -> 'take (1).bvh'
 */
export function uniquePath(filePath: string, exists: (candidate: string) => boolean = pathExists): string {
  const dir = path.dirname(filePath);
  const ext = path.extname(filePath);
  const base = path.basename(filePath, ext);

  let candidate = filePath;
  let i = 1;
  while (exists(candidate)) {
    candidate = path.join(dir, `${base} (${i++})${ext}`);
  }
  return candidate;
}
