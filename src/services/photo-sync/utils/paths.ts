/**
 * Extensions (lowercase) treated as media when scanning for new local files
 */
export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.heic',
  '.heif',
  '.raw',
  '.webp',
  '.mp4',
  '.mov',
])

/**
 * Root-relative path of a file in a folder ('' is the root)
 */
export function computeLocalPath(folder: string, filename: string): string {
  return folder ? `${folder}/${filename}` : filename
}

/**
 * Splits a base name into stem and extension. The extension is the suffix
 * from the last dot; a leading dot does not start an extension.
 */
export function splitFilename(filename: string): { stem: string; ext: string } {
  const dot = filename.lastIndexOf('.')
  if (dot <= 0) {
    return { stem: filename, ext: '' }
  }
  return { stem: filename.slice(0, dot), ext: filename.slice(dot) }
}

export function isMediaFile(filename: string): boolean {
  return MEDIA_EXTENSIONS.has(splitFilename(filename).ext.toLowerCase())
}
