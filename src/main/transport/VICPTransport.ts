import { SocketConnection } from '../net/SocketConnection';
import { VICPProtocol } from '../vicp/VICPProtocol';
import type { InstrumentTransport } from './types';
import { parseDefiniteBlock } from '../capture/ImageFinalizer';
import { EnvelopeParseError, QueryError, StreamTimeoutError } from '../utils/errors';
import { delay } from '../utils/timing';
import { logger } from '../utils/logger';
import { SETTLE_DELAYS } from '@shared/constants';

export interface VICPTransportOptions {
  /** Per-read timeout while receiving frames */
  timeoutMs: number;
  /** Wait between `*IDN?` and reading its answer */
  identifySettleMs?: number;
}

/**
 * LeCroy VICP over a raw TCP socket. Every command goes out as one frame;
 * every response is a run of frames ending in EOI, a close or a stall.
 */
export class VICPTransport implements InstrumentTransport {
  readonly kind = 'vicp' as const;
  private readonly protocol = new VICPProtocol();
  private closed = false;

  private constructor(
    private readonly connection: SocketConnection,
    readonly label: string,
    private readonly timeoutMs: number,
    private readonly identifySettleMs: number
  ) {}

  static async open(host: string, port: number, options: VICPTransportOptions): Promise<VICPTransport> {
    const connection = new SocketConnection();
    await connection.open(host, port, options.timeoutMs);
    logger.info(`[VICP] Session open on ${host}:${port}`);
    return new VICPTransport(
      connection,
      `${host}:${port} (VICP)`,
      options.timeoutMs,
      options.identifySettleMs ?? SETTLE_DELAYS.VICP_IDENTIFY
    );
  }

  async identify(): Promise<string> {
    await this.write('*IDN?');
    await delay(this.identifySettleMs);

    const response = await this.protocol.receiveStream(this.connection, this.timeoutMs);
    if (response.frames === 0) {
      throw new QueryError(`No *IDN? response from ${this.label} (${response.endedBy})`);
    }
    return response.data.toString('ascii').trim();
  }

  async write(command: string): Promise<void> {
    await this.connection.write(this.protocol.encode(command));
  }

  async readRaw(): Promise<Buffer> {
    const response = await this.protocol.receiveStream(this.connection, this.timeoutMs);
    if (response.frames === 0) {
      throw new StreamTimeoutError(`No VICP frames from ${this.label} (${response.endedBy})`);
    }
    return response.data;
  }

  async queryBinaryBlock(command: string, settleMs: number): Promise<Buffer> {
    await this.write(command);
    await delay(settleMs);

    const raw = await this.readRaw();
    try {
      return parseDefiniteBlock(raw);
    } catch (error) {
      if (error instanceof EnvelopeParseError) {
        throw new QueryError(`${command} did not return a definite-length block: ${error.message}`, error);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.connection.close();
  }
}
