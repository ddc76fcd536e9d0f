import { getDefaultLogger, type Logger } from '../../types/logger.js';
import { DEFAULT_TEXT_EXTENSIONS, isBinaryFile } from '../../utils/file-type.js';
import { buildActiveCommandArgument, parsePassiveAddress, type DataAddress } from './address.js';
import {
  parseStructuredListing,
  parseTextListing,
  type ListingEntry,
} from './listing.js';
import { selectTransferMode, type TransferMode } from './modes.js';
import { parseReply, type FtpReply } from './reply.js';

/**
 * Parsing capabilities a client composes in
 */
export interface FtpProtocolParser {
  parseReply(line: string): FtpReply;
  parsePassiveAddress(line: string): DataAddress;
  buildActiveCommandArgument(host: string, port: number): string;
  parseStructuredListing(lines: Iterable<string>): ListingEntry[];
  parseTextListing(lines: Iterable<string>, now?: Date): ListingEntry[];
  isBinaryFile(filename: string): boolean;
  transferModeFor(filename: string): TransferMode;
}

export interface FtpProtocolOptions {
  /** Diagnostics sink (default: process-wide logger) */
  logger?: Logger;
  /** Extensions sent in ASCII mode */
  textExtensions?: readonly string[];
  /** Replaces the extension-based binary check entirely */
  classifier?: (filename: string) => boolean;
}

/**
 * Stateless protocol interpreter bound to a logger and a file classifier
 *
 * @example
 * ```typescript
 * const protocol = new FtpProtocol({ logger: pino() });
 * const { code, message } = protocol.parseReply('227 Entering Passive Mode (10,0,0,5,195,80)');
 * const address = protocol.parsePassiveAddress(message);
 * ```
 */
export class FtpProtocol implements FtpProtocolParser {
  readonly logger: Logger;
  private readonly classifier: (filename: string) => boolean;

  constructor(options: FtpProtocolOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
    const textExtensions = options.textExtensions ?? DEFAULT_TEXT_EXTENSIONS;
    this.classifier = options.classifier ?? ((filename) => isBinaryFile(filename, textExtensions));
  }

  parseReply(line: string): FtpReply {
    return parseReply(line, { logger: this.logger });
  }

  parsePassiveAddress(line: string): DataAddress {
    return parsePassiveAddress(line);
  }

  buildActiveCommandArgument(host: string, port: number): string {
    return buildActiveCommandArgument(host, port);
  }

  parseStructuredListing(lines: Iterable<string>): ListingEntry[] {
    return parseStructuredListing(lines, { logger: this.logger });
  }

  parseTextListing(lines: Iterable<string>, now?: Date): ListingEntry[] {
    return parseTextListing(lines, { logger: this.logger, now });
  }

  isBinaryFile(filename: string): boolean {
    return this.classifier(filename);
  }

  transferModeFor(filename: string): TransferMode {
    return selectTransferMode(filename, this.classifier);
  }
}
