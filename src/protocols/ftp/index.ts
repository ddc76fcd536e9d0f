/**
 * FTP protocol interpretation
 *
 * Reply, address and listing parsers plus the command layer that drives
 * them over a caller-supplied control channel.
 */

export {
  ReplyCode,
  ReplyCategory,
  parseReply,
  replyCategory,
  isReplyLine,
  isPositiveReply,
  isNegativeReply,
  isTransientReply,
  type FtpReply,
  type ReplyParseOptions
} from './reply.js';

export {
  parsePassiveAddress,
  buildActiveCommandArgument,
  type DataAddress
} from './address.js';

export {
  parseStructuredListing,
  parseTextListing,
  parseFactTimestamp,
  parseListDate,
  splitListingLines,
  type ListingEntry,
  type ListingEntryType,
  type ListingParseOptions
} from './listing.js';

export {
  TransferMode,
  ConnectionMode,
  transferModeName,
  connectionModeName,
  isTransferMode,
  isConnectionMode,
  selectTransferMode
} from './modes.js';

export {
  invokeCommand,
  invokeCommandAsync,
  wrapCommand,
  wrapAsyncCommand
} from './command.js';

export {
  FtpProtocol,
  type FtpProtocolParser,
  type FtpProtocolOptions
} from './protocol.js';

export {
  FtpCommands,
  type ControlChannel,
  type DataTarget,
  type FtpCommandsOptions
} from './commands.js';
