import { SocketConnection } from '../net/SocketConnection';
import type { InstrumentResource, ResourceManager } from './types';
import { parseResourceAddress } from './resourceAddress';
import { parseDefiniteBlock } from '../capture/ImageFinalizer';
import { ConnectError, EnvelopeParseError, QueryError } from '../utils/errors';
import { delay } from '../utils/timing';
import { logger } from '../utils/logger';

const BLOCK_MARKER = 0x23; // '#'
const LINE_FEED = 0x0a;

/**
 * Session over a raw SCPI socket (`TCPIP::host::port::SOCKET`).
 */
export class SocketInstrumentResource implements InstrumentResource {
  public readTermination: string | null = '\n';
  public writeTermination = '\n';

  constructor(
    public readonly address: string,
    private readonly connection: SocketConnection,
    public timeoutMs: number
  ) {}

  async write(command: string): Promise<void> {
    await this.connection.write(`${command}${this.writeTermination}`);
  }

  async read(): Promise<string> {
    const raw = await this.readRaw();
    return raw.toString('ascii').replace(/\r$/, '');
  }

  async query(command: string): Promise<string> {
    await this.write(command);
    return this.read();
  }

  /**
   * With a termination set, one line. Without, either a definite-length
   * block read to its declared size or whatever arrives before the
   * instrument goes quiet for a full timeout period.
   */
  async readRaw(): Promise<Buffer> {
    if (this.readTermination !== null) {
      const terminator = this.readTermination.charCodeAt(this.readTermination.length - 1);
      return this.connection.readUntil(terminator, this.timeoutMs);
    }

    const first = await this.connection.readExact(1, this.timeoutMs);
    if (first[0] !== BLOCK_MARKER) {
      const rest = await this.connection.readUntilIdle(this.timeoutMs);
      return Buffer.concat([first, rest]);
    }

    const digit = await this.connection.readExact(1, this.timeoutMs);
    const digitCount = digit[0] - 0x30;
    if (digitCount < 1 || digitCount > 9) {
      const rest = await this.connection.readUntilIdle(this.timeoutMs);
      return Buffer.concat([first, digit, rest]);
    }

    const lengthField = await this.connection.readExact(digitCount, this.timeoutMs);
    const byteCount = Number(lengthField.toString('ascii'));
    if (!Number.isInteger(byteCount) || byteCount < 0) {
      const rest = await this.connection.readUntilIdle(this.timeoutMs);
      return Buffer.concat([first, digit, lengthField, rest]);
    }

    const payload = await this.connection.readExact(byteCount, this.timeoutMs);
    this.connection.discardIfNext(LINE_FEED);
    return Buffer.concat([first, digit, lengthField, payload]);
  }

  async queryBinaryValues(command: string, delayMs: number): Promise<Buffer> {
    await this.write(command);
    await delay(delayMs);

    const termination = this.readTermination;
    this.readTermination = null;
    try {
      return parseDefiniteBlock(await this.readRaw());
    } catch (error) {
      if (error instanceof EnvelopeParseError) {
        throw new QueryError(`${command} did not return a definite-length block: ${error.message}`, error);
      }
      throw error;
    } finally {
      this.readTermination = termination;
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

/**
 * Resource manager for raw SCPI sockets. VXI-11, HiSLIP and USB resources
 * need a VISA backend and are refused.
 */
export class SocketResourceManager implements ResourceManager {
  private readonly open = new Set<SocketInstrumentResource>();

  async openResource(address: string, openTimeoutMs: number): Promise<InstrumentResource> {
    const parsed = parseResourceAddress(address);

    if (!parsed || parsed.interfaceType !== 'TCPIP' || parsed.resourceClass !== 'SOCKET') {
      throw new ConnectError(`No session backend for ${address} (only TCPIP::<host>::<port>::SOCKET is built in)`);
    }
    if (parsed.host === undefined || parsed.port === undefined) {
      throw new ConnectError(`Malformed socket resource ${address}`);
    }

    const connection = new SocketConnection();
    await connection.open(parsed.host, parsed.port, openTimeoutMs);

    const resource = new SocketInstrumentResource(address, connection, openTimeoutMs);
    this.open.add(resource);
    logger.debug(`Opened socket resource ${address}`);
    return resource;
  }

  async listResources(pattern: string): Promise<string[]> {
    logger.debug(`Socket backend cannot enumerate ${pattern}`);
    return [];
  }

  async close(): Promise<void> {
    const resources = [...this.open];
    this.open.clear();
    await Promise.all(resources.map(resource => resource.close()));
  }
}
