/**
 * FTP command layer
 *
 * Turns client intent into command lines and server replies into values.
 * Socket handling stays with the injected {@link ControlChannel}.
 */

import type { FtpwireConfig } from '../../config.js';
import { ConfigurationError, FtpCommandError, InvalidResponseError } from '../../core/errors.js';
import type { Logger } from '../../types/logger.js';
import type { DataAddress } from './address.js';
import { invokeCommandAsync } from './command.js';
import type { ListingEntry } from './listing.js';
import { ConnectionMode, TransferMode } from './modes.js';
import { FtpProtocol, type FtpProtocolParser } from './protocol.js';
import { ReplyCode } from './reply.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Where the data connection for a transfer should go
 */
export type DataTarget =
  | { mode: typeof ConnectionMode.PASSIVE; address: DataAddress }
  | { mode: typeof ConnectionMode.ACTIVE; address: DataAddress };

/**
 * Transport collaborator that owns the control and data sockets
 */
export interface ControlChannel {
  /** Write one command line and resolve with the final reply line */
  send(command: string): Promise<string>;
  /** Open the data connection for `target`, send `command`, and collect the lines received */
  receiveLines(command: string, target: DataTarget): Promise<string[]>;
  /** Start listening for an active-mode data connection and report the local address */
  listenForData?(): Promise<DataAddress>;
}

export interface FtpCommandsOptions {
  protocol?: FtpProtocolParser;
  logger?: Logger;
  /** @default 'PASV' */
  connectionMode?: ConnectionMode;
  /** Fixed transfer mode; omit to choose per file */
  transferMode?: TransferMode;
}

interface CompletedReply {
  code: number;
  message: string;
}

// ============================================================================
// Command layer
// ============================================================================

/**
 * @example
 * ```typescript
 * const commands = new FtpCommands(channel, { connectionMode: ConnectionMode.PASSIVE });
 * await commands.cwd('/pub');
 * const entries = await commands.mlsd();
 * ```
 */
export class FtpCommands {
  private readonly protocol: FtpProtocolParser;
  private readonly logger?: Logger;
  private connectionMode: ConnectionMode;
  private readonly fixedTransferMode?: TransferMode;
  private currentTransferMode?: TransferMode;

  constructor(
    private readonly channel: ControlChannel,
    options: FtpCommandsOptions = {}
  ) {
    this.protocol = options.protocol ?? new FtpProtocol({ logger: options.logger });
    this.logger = options.logger;
    this.connectionMode = options.connectionMode ?? ConnectionMode.PASSIVE;
    this.fixedTransferMode = options.transferMode;
  }

  /**
   * Build a command layer from resolved configuration
   */
  static fromConfig(channel: ControlChannel, config: FtpwireConfig, logger?: Logger): FtpCommands {
    return new FtpCommands(channel, {
      logger,
      protocol: new FtpProtocol({ logger, textExtensions: config.textExtensions }),
      connectionMode: config.connectionMode,
      transferMode: config.transferMode === 'auto' ? undefined : config.transferMode,
    });
  }

  getConnectionMode(): ConnectionMode {
    return this.connectionMode;
  }

  setConnectionMode(mode: ConnectionMode): this {
    this.connectionMode = mode;
    return this;
  }

  getTransferMode(): TransferMode | undefined {
    return this.currentTransferMode;
  }

  // ==========================================================================
  // Mode negotiation
  // ==========================================================================

  async type(mode: TransferMode): Promise<void> {
    return this.run('type', [mode], () => this.applyTransferMode(mode));
  }

  async pasv(): Promise<DataAddress> {
    return this.run('pasv', [], () => this.requestPassiveAddress());
  }

  async port(host: string, port: number): Promise<void> {
    return this.run('port', [host, port], () => this.announceActiveAddress(host, port));
  }

  /**
   * Send TYPE when the file calls for a different mode than the current one
   */
  async prepareTransfer(filename: string): Promise<TransferMode> {
    return this.run('prepareTransfer', [filename], async () => {
      const mode = this.fixedTransferMode ?? this.protocol.transferModeFor(filename);
      if (mode !== this.currentTransferMode) {
        await this.applyTransferMode(mode);
      }
      return mode;
    });
  }

  // ==========================================================================
  // Directory commands
  // ==========================================================================

  async pwd(): Promise<string> {
    return this.run('pwd', [], async () => {
      const reply = await this.exchange('PWD', [ReplyCode.PATHNAME_CREATED]);
      return this.extractQuotedPath(reply, 'PWD');
    });
  }

  async cwd(path: string): Promise<void> {
    return this.run('cwd', [path], async () => {
      await this.exchange(`CWD ${path}`, [ReplyCode.FILE_ACTION_OK, ReplyCode.OK]);
    });
  }

  async cdup(): Promise<void> {
    return this.run('cdup', [], async () => {
      await this.exchange('CDUP', [ReplyCode.FILE_ACTION_OK, ReplyCode.OK]);
    });
  }

  /**
   * Create a directory and return the path the server reports for it
   */
  async mkd(path: string): Promise<string> {
    return this.run('mkd', [path], async () => {
      const reply = await this.exchange(`MKD ${path}`, [ReplyCode.PATHNAME_CREATED]);
      return reply.message.includes('"') ? this.extractQuotedPath(reply, 'MKD') : path;
    });
  }

  async rmd(path: string): Promise<void> {
    return this.run('rmd', [path], async () => {
      await this.exchange(`RMD ${path}`, [ReplyCode.FILE_ACTION_OK]);
    });
  }

  async list(path?: string): Promise<ListingEntry[]> {
    return this.run('list', path === undefined ? [] : [path], async () => {
      const lines = await this.receive(path ? `LIST ${path}` : 'LIST');
      return this.protocol.parseTextListing(lines);
    });
  }

  async mlsd(path?: string): Promise<ListingEntry[]> {
    return this.run('mlsd', path === undefined ? [] : [path], async () => {
      const lines = await this.receive(path ? `MLSD ${path}` : 'MLSD');
      return this.protocol.parseStructuredListing(lines);
    });
  }

  // ==========================================================================
  // File commands
  // ==========================================================================

  async dele(path: string): Promise<void> {
    return this.run('dele', [path], async () => {
      await this.exchange(`DELE ${path}`, [ReplyCode.FILE_ACTION_OK]);
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    return this.run('rename', [fromPath, toPath], async () => {
      await this.exchange(`RNFR ${fromPath}`, [ReplyCode.FILE_ACTION_PENDING]);
      await this.exchange(`RNTO ${toPath}`, [ReplyCode.FILE_ACTION_OK]);
    });
  }

  async size(path: string): Promise<number> {
    return this.run('size', [path], async () => {
      const reply = await this.exchange(`SIZE ${path}`, [ReplyCode.FILE_STATUS]);
      if (!/^\d+$/.test(reply.message)) {
        throw new InvalidResponseError(`${reply.code} ${reply.message}`, 'SIZE');
      }
      return parseInt(reply.message, 10);
    });
  }

  /**
   * Modification time as the server reports it (`YYYYMMDDHHMMSS`)
   */
  async mdtm(path: string): Promise<string> {
    return this.run('mdtm', [path], async () => {
      const reply = await this.exchange(`MDTM ${path}`, [ReplyCode.FILE_STATUS]);
      return reply.message;
    });
  }

  async noop(): Promise<void> {
    return this.run('noop', [], async () => {
      await this.exchange('NOOP', [ReplyCode.OK]);
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private run<T>(name: string, args: readonly unknown[], operation: () => Promise<T>): Promise<T> {
    return invokeCommandAsync(name, args, operation, this.logger);
  }

  private async exchange(command: string, expected: readonly number[]): Promise<CompletedReply> {
    const verb = command.split(' ')[0];
    const line = await this.channel.send(command);
    const reply = this.protocol.parseReply(line);

    if (reply.code === null) {
      throw new InvalidResponseError(line, verb);
    }
    if (reply.code >= 400) {
      throw new FtpCommandError(verb, reply.code, reply.message);
    }
    if (!expected.includes(reply.code)) {
      throw new InvalidResponseError(`${reply.code} ${reply.message}`, verb);
    }

    return { code: reply.code, message: reply.message };
  }

  private async receive(command: string): Promise<string[]> {
    const target = await this.prepareDataConnection();
    return this.channel.receiveLines(command, target);
  }

  private async prepareDataConnection(): Promise<DataTarget> {
    if (this.connectionMode === ConnectionMode.PASSIVE) {
      return { mode: ConnectionMode.PASSIVE, address: await this.requestPassiveAddress() };
    }

    if (!this.channel.listenForData) {
      throw new ConfigurationError('Active mode needs a channel that can listen for data connections', {
        configKey: 'connectionMode',
      });
    }

    const address = await this.channel.listenForData();
    await this.announceActiveAddress(address.host, address.port);
    return { mode: ConnectionMode.ACTIVE, address };
  }

  // The helpers below run inside the caller's run() so a failure is logged once

  private async applyTransferMode(mode: TransferMode): Promise<void> {
    await this.exchange(`TYPE ${mode}`, [ReplyCode.OK]);
    this.currentTransferMode = mode;
  }

  private async requestPassiveAddress(): Promise<DataAddress> {
    const reply = await this.exchange('PASV', [ReplyCode.ENTERING_PASSIVE]);
    return this.protocol.parsePassiveAddress(reply.message);
  }

  private async announceActiveAddress(host: string, port: number): Promise<void> {
    const argument = this.protocol.buildActiveCommandArgument(host, port);
    await this.exchange(`PORT ${argument}`, [ReplyCode.OK]);
  }

  // 257 "/home/user" is the current directory; embedded quotes are doubled
  private extractQuotedPath(reply: CompletedReply, verb: string): string {
    const match = reply.message.match(/"((?:[^"]|"")*)"/);
    if (!match) {
      throw new InvalidResponseError(`${reply.code} ${reply.message}`, verb);
    }
    return match[1].replace(/""/g, '"');
  }
}
