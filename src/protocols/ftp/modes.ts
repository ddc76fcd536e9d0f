/**
 * Transfer and connection mode vocabularies
 *
 * Values are the literal protocol tokens: the TYPE argument for transfer
 * modes and the command name for connection modes.
 */

import { isBinaryFile } from '../../utils/file-type.js';

export const TransferMode = {
  ASCII: 'A',
  BINARY: 'I',
} as const;

export type TransferMode = (typeof TransferMode)[keyof typeof TransferMode];

export const ConnectionMode = {
  ACTIVE: 'PORT',
  PASSIVE: 'PASV',
} as const;

export type ConnectionMode = (typeof ConnectionMode)[keyof typeof ConnectionMode];

export function transferModeName(mode: TransferMode): keyof typeof TransferMode {
  return mode === TransferMode.ASCII ? 'ASCII' : 'BINARY';
}

export function connectionModeName(mode: ConnectionMode): keyof typeof ConnectionMode {
  return mode === ConnectionMode.ACTIVE ? 'ACTIVE' : 'PASSIVE';
}

export function isTransferMode(value: unknown): value is TransferMode {
  return value === TransferMode.ASCII || value === TransferMode.BINARY;
}

export function isConnectionMode(value: unknown): value is ConnectionMode {
  return value === ConnectionMode.ACTIVE || value === ConnectionMode.PASSIVE;
}

/**
 * Pick the transfer mode for a file by name
 *
 * @example
 * ```typescript
 * selectTransferMode('notes.txt');   // 'A'
 * selectTransferMode('archive.zip'); // 'I'
 * ```
 */
export function selectTransferMode(
  filename: string,
  classifier: (filename: string) => boolean = isBinaryFile
): TransferMode {
  return classifier(filename) ? TransferMode.BINARY : TransferMode.ASCII;
}
