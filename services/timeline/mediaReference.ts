/**
 * Media references for FCPXML assets.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { AssetReferenceError } from './errors.js';

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:[\\/]/;

export function isWindowsPath(imagePath: string): boolean {
  return WINDOWS_DRIVE_PATTERN.test(imagePath);
}

/**
 * Convert a local image path into the `src` of a media-rep.
 *
 * Windows drive paths become `file://localhost/C:/...` with forward slashes;
 * absolute POSIX paths go through pathToFileURL. Anything else throws
 * AssetReferenceError.
 */
export function toMediaUrl(imagePath: string): string {
  if (imagePath.trim().length === 0) {
    throw new AssetReferenceError(imagePath, 'path is empty');
  }
  if (imagePath.includes('\0')) {
    throw new AssetReferenceError(imagePath, 'path contains a NUL byte');
  }

  if (isWindowsPath(imagePath)) {
    return `file://localhost/${imagePath.replace(/\\/g, '/')}`;
  }

  if (!path.posix.isAbsolute(imagePath)) {
    throw new AssetReferenceError(imagePath, 'path is not absolute');
  }

  return pathToFileURL(imagePath).href;
}

/**
 * File name without extension, used for asset and clip names.
 */
export function mediaName(imagePath: string): string {
  const flavour = isWindowsPath(imagePath) ? path.win32 : path.posix;
  return flavour.parse(imagePath).name;
}
