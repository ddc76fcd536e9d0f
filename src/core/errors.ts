export class FtpError extends Error {
  code?: number;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    code?: number,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'FtpError';
    this.code = code;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Error thrown when a parse operation fails
 */
export class ParseError extends FtpError {
  format?: string;
  input?: string;

  constructor(
    message: string,
    options?: {
      format?: string;
      input?: string;
    }
  ) {
    super(
      message,
      undefined,
      [
        'Verify the input is in the expected format.',
        'Check for malformed or corrupted data.',
        'Ensure the encoding is correct (UTF-8, etc.).'
      ],
      false
    );
    this.name = 'ParseError';
    this.format = options?.format;
    this.input = options?.input;
  }
}

/**
 * Error thrown when a PASV-style reply carries no usable h1,h2,h3,h4,p1,p2 tuple
 */
export class MalformedAddressError extends ParseError {
  constructor(input: string, reason = 'expected six comma-separated numbers') {
    super(`Malformed address in "${input}": ${reason}`, { format: 'pasv', input });
    this.name = 'MalformedAddressError';
    this.suggestions = [
      'Check that the server replied to PASV with a 227 reply.',
      'Some servers only support EPSV; passive mode over PASV will not work with them.',
      'Switch to active mode (PORT) if the server cannot report a passive address.'
    ];
  }
}

/**
 * Error thrown when a reply line does not start with a three-digit code
 * where the caller cannot continue without one
 */
export class InvalidResponseError extends FtpError {
  response: string;

  constructor(response: string, command?: string) {
    super(
      command
        ? `Invalid response to ${command}: ${response}`
        : `Invalid response: ${response}`,
      undefined,
      [
        'Confirm the remote endpoint is an FTP server.',
        'Check whether the server sent a multi-line reply the transport did not join.'
      ],
      false
    );
    this.name = 'InvalidResponseError';
    this.response = response;
  }
}

/**
 * Error thrown when the server answers a command with a negative reply (4xx/5xx)
 */
export class FtpCommandError extends FtpError {
  command: string;
  replyMessage: string;

  constructor(command: string, code: number, replyMessage: string) {
    super(
      `${command} failed with ${code} ${replyMessage}`.trimEnd(),
      code,
      code < 500
        ? ['The failure is transient; retry the command.', 'Reduce concurrent sessions if the server is busy.']
        : ['Check the command arguments and the remote path.', 'Verify the account has permission for this operation.'],
      isTransientCode(code)
    );
    this.name = 'FtpCommandError';
    this.command = command;
    this.replyMessage = replyMessage;
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends FtpError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
    }
  ) {
    super(
      message,
      undefined,
      [
        'Check the input format and constraints.',
        'Ensure required fields are provided.'
      ],
      false
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends FtpError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
    }
  ) {
    super(
      message,
      undefined,
      [
        'Check the options object or FTPWIRE_* environment variables.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

function isTransientCode(code: number): boolean {
  return code >= 400 && code < 500;
}
