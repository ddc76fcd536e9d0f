import { extname } from 'node:path';

/**
 * Extensions transferred in ASCII mode; everything else goes as binary
 */
export const DEFAULT_TEXT_EXTENSIONS: readonly string[] = [
  '.txt', '.md', '.html', '.htm', '.css', '.js', '.json',
  '.xml', '.csv', '.log', '.ini', '.conf', '.cfg',
  '.py', '.java', '.c', '.cpp', '.h', '.sh', '.bat',
  '.yaml', '.yml', '.toml',
];

/**
 * Whether a file should be transferred in binary (image) mode
 *
 * Names without an extension, dotfiles included, count as binary.
 */
export function isBinaryFile(
  filename: string,
  textExtensions: readonly string[] = DEFAULT_TEXT_EXTENSIONS
): boolean {
  const ext = extname(filename.toLowerCase());
  return !textExtensions.includes(ext);
}
