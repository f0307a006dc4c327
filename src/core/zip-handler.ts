// core/zip-handler.ts
// Package rendered documents into a single zip archive

import JSZip from 'jszip';
import { PackagingError, describeError } from '../types/index.js';

export interface ArchiveEntry {
  name: string;
  content: Buffer;
}

/**
 * Pick a name not yet taken in the archive. A clash gets `_<position>`
 * appended before the extension, then a counter if that is taken too.
 * `taken` holds lower-cased names.
 */
export function uniqueEntryName(name: string, position: number, taken: Set<string>): string {
  // Case-insensitive filesystems would merge names differing only in case
  const claim = (candidate: string): string => {
    taken.add(candidate.toLowerCase());
    return candidate;
  };
  const isTaken = (candidate: string): boolean => taken.has(candidate.toLowerCase());

  if (!isTaken(name)) {
    return claim(name);
  }

  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const ext = dot > 0 ? name.slice(dot) : '';

  let candidate = `${stem}_${position}${ext}`;
  for (let n = 2; isTaken(candidate); n++) {
    candidate = `${stem}_${position}_${n}${ext}`;
  }

  return claim(candidate);
}

export async function buildArchive(entries: ArchiveEntry[]): Promise<Buffer> {
  if (entries.length === 0) {
    throw new PackagingError('Nothing to package', 'Archive would be empty');
  }

  try {
    const zip = new JSZip();
    for (const entry of entries) {
      zip.file(entry.name, entry.content);
    }
    return await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
    });
  } catch (error) {
    throw new PackagingError('Failed to build archive', describeError(error));
  }
}

/**
 * List file names and contents of an archive (used to inspect batch output)
 */
export async function readArchive(buffer: Buffer): Promise<ArchiveEntry[]> {
  const zip = await JSZip.loadAsync(buffer);
  const entries: ArchiveEntry[] = [];

  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    entries.push({ name: file.name, content: await file.async('nodebuffer') });
  }

  return entries;
}
