/**
 * Reply line parsing
 *
 * A reply is a three-digit code followed by free text. Only single-line
 * replies are interpreted; a continuation line (`230-...`) parses like any
 * other line, with the dash kept in the message.
 */

import { getDefaultLogger, type Logger } from '../../types/logger.js';

// ============================================================================
// FTP Reply Codes (RFC 959)
// ============================================================================

export const ReplyCode = {
  // 1xx - Positive Preliminary
  RESTART_MARKER: 110,
  SERVICE_READY_IN: 120,
  DATA_CONNECTION_OPEN: 125,
  FILE_STATUS_OK: 150,

  // 2xx - Positive Completion
  OK: 200,
  SUPERFLUOUS: 202,
  SYSTEM_STATUS: 211,
  DIRECTORY_STATUS: 212,
  FILE_STATUS: 213,
  HELP_MESSAGE: 214,
  SYSTEM_TYPE: 215,
  SERVICE_READY: 220,
  SERVICE_CLOSING: 221,
  DATA_CONNECTION_READY: 225,
  CLOSING_DATA_CONNECTION: 226,
  ENTERING_PASSIVE: 227,
  USER_LOGGED_IN: 230,
  FILE_ACTION_OK: 250,
  PATHNAME_CREATED: 257,

  // 3xx - Positive Intermediate
  NEED_PASSWORD: 331,
  NEED_ACCOUNT: 332,
  FILE_ACTION_PENDING: 350,

  // 4xx - Transient Negative
  SERVICE_UNAVAILABLE: 421,
  CANT_OPEN_DATA: 425,
  CONNECTION_CLOSED: 426,
  FILE_BUSY: 450,
  LOCAL_ERROR: 451,
  INSUFFICIENT_SPACE: 452,

  // 5xx - Permanent Negative
  SYNTAX_ERROR: 500,
  SYNTAX_ERROR_PARAMS: 501,
  NOT_IMPLEMENTED: 502,
  BAD_SEQUENCE: 503,
  NOT_IMPLEMENTED_PARAM: 504,
  NOT_LOGGED_IN: 530,
  NEED_ACCOUNT_STORE: 532,
  FILE_NOT_FOUND: 550,
  PAGE_TYPE_UNKNOWN: 551,
  EXCEEDED_ALLOCATION: 552,
  FILE_NAME_NOT_ALLOWED: 553,
} as const;

export const ReplyCategory = {
  POSITIVE_PRELIMINARY: 1,
  POSITIVE_COMPLETION: 2,
  POSITIVE_INTERMEDIATE: 3,
  NEGATIVE_TRANSIENT: 4,
  NEGATIVE_PERMANENT: 5,
} as const;

export type ReplyCategory = (typeof ReplyCategory)[keyof typeof ReplyCategory];

// ============================================================================
// Types
// ============================================================================

export interface FtpReply {
  /** Three-digit code, or null when the line does not start with one */
  code: number | null;
  message: string;
}

export interface ReplyParseOptions {
  logger?: Logger;
}

// ============================================================================
// Parsing
// ============================================================================

const REPLY_CODE = /^\d{3}/;

export function isReplyLine(line: string): boolean {
  return REPLY_CODE.test(line);
}

/**
 * Split a reply line into code and message
 *
 * Never throws: a line that does not start with three digits comes back
 * whole as the message, with a null code.
 *
 * @example
 * ```typescript
 * parseReply('230 Login successful.'); // { code: 230, message: 'Login successful.' }
 * parseReply('xyz bad');               // { code: null, message: 'xyz bad' }
 * ```
 */
export function parseReply(line: string, options: ReplyParseOptions = {}): FtpReply {
  if (!isReplyLine(line)) {
    const logger = options.logger ?? getDefaultLogger();
    logger.error({ reply: line }, 'Unable to parse FTP reply');
    return { code: null, message: line };
  }

  return {
    code: parseInt(line.slice(0, 3), 10),
    message: line.slice(3).trim(),
  };
}

export function replyCategory(code: number): ReplyCategory | undefined {
  switch (Math.floor(code / 100)) {
    case 1: return ReplyCategory.POSITIVE_PRELIMINARY;
    case 2: return ReplyCategory.POSITIVE_COMPLETION;
    case 3: return ReplyCategory.POSITIVE_INTERMEDIATE;
    case 4: return ReplyCategory.NEGATIVE_TRANSIENT;
    case 5: return ReplyCategory.NEGATIVE_PERMANENT;
    default: return undefined;
  }
}

export function isPositiveReply(reply: FtpReply): boolean {
  if (reply.code === null) return false;
  const category = replyCategory(reply.code);
  return category !== undefined && category <= ReplyCategory.POSITIVE_INTERMEDIATE;
}

export function isNegativeReply(reply: FtpReply): boolean {
  if (reply.code === null) return false;
  const category = replyCategory(reply.code);
  return category === ReplyCategory.NEGATIVE_TRANSIENT || category === ReplyCategory.NEGATIVE_PERMANENT;
}

export function isTransientReply(reply: FtpReply): boolean {
  return reply.code !== null && replyCategory(reply.code) === ReplyCategory.NEGATIVE_TRANSIENT;
}
