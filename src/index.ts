/**
 * ftpwire - FTP protocol interpretation layer
 *
 * @example
 * ```typescript
 * import { parseReply, parsePassiveAddress, parseTextListing } from 'ftpwire';
 *
 * const reply = parseReply('227 Entering Passive Mode (192,168,1,10,4,1).');
 * const { host, port } = parsePassiveAddress(reply.message);
 * const entries = parseTextListing(payload.split('\r\n'));
 * ```
 */

export * from './protocols/ftp/index.js';

export {
  FtpError,
  ParseError,
  MalformedAddressError,
  InvalidResponseError,
  FtpCommandError,
  ValidationError,
  ConfigurationError
} from './core/errors.js';

export {
  consoleLogger,
  silentLogger,
  createLevelLogger,
  getDefaultLogger,
  setDefaultLogger,
  type Logger,
  type LogLevel
} from './types/logger.js';

export {
  configure,
  resolveConfig,
  detectLogLevel,
  ftpwireConfigSchema,
  type FtpwireConfig,
  type FtpwireConfigInput
} from './config.js';

export { isBinaryFile, DEFAULT_TEXT_EXTENSIONS } from './utils/file-type.js';
export { parsePermissions, formatPermissions } from './utils/permissions.js';
