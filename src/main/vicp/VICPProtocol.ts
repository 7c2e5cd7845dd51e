import { VICPFlag, VICP_PROTOCOL } from './types';
import type { FrameReader, StreamEnd, VICPFrameHeader, VICPStreamResult } from './types';
import { EnvelopeParseError, StreamClosedError, StreamTimeoutError } from '../utils/errors';
import { logger } from '../utils/logger';

export class VICPProtocol {
  /** Last sequence number handed out; one counter per connection */
  private sequence = 0;

  /**
   * Encode a command as a single DATA|REMOTE|EOI frame
   * Format: [flags][version][sequence][reserved][length u32 BE][ascii payload]
   */
  encode(command: string): Buffer {
    const payload = Buffer.from(command, 'ascii');
    const buffer = Buffer.alloc(VICP_PROTOCOL.HEADER_LENGTH + payload.length);

    buffer[0] = VICP_PROTOCOL.COMMAND_FLAGS;
    buffer[1] = VICP_PROTOCOL.VERSION;
    buffer[2] = this.nextSequence();
    buffer[3] = 0x00; // reserved
    buffer.writeUInt32BE(payload.length, VICP_PROTOCOL.LENGTH_OFFSET);
    payload.copy(buffer, VICP_PROTOCOL.HEADER_LENGTH);

    return buffer;
  }

  /** Wraps 255 -> 1; 0 is never used */
  nextSequence(): number {
    this.sequence = (this.sequence % VICP_PROTOCOL.MAX_SEQUENCE) + 1;
    return this.sequence;
  }

  decodeHeader(buffer: Buffer): VICPFrameHeader {
    if (buffer.length < VICP_PROTOCOL.HEADER_LENGTH) {
      throw new EnvelopeParseError(
        `VICP header needs ${VICP_PROTOCOL.HEADER_LENGTH} bytes, got ${buffer.length}`
      );
    }

    return {
      flags: buffer[0],
      version: buffer[1],
      sequence: buffer[2],
      payloadLength: buffer.readUInt32BE(VICP_PROTOCOL.LENGTH_OFFSET),
    };
  }

  /**
   * Read frames until one carries EOI.
   *
   * Only DATA frames contribute to the result; SRQ and other control frames
   * are consumed and dropped. Scopes often close the socket or simply stop
   * sending instead of flagging the last frame, so a close or a read timeout
   * ends the stream with whatever has accumulated.
   */
  async receiveStream(reader: FrameReader, timeoutMs: number): Promise<VICPStreamResult> {
    const chunks: Buffer[] = [];
    let total = 0;
    let frames = 0;
    let endedBy: StreamEnd = 'eoi';

    try {
      for (;;) {
        const header = this.decodeHeader(await reader.readExact(VICP_PROTOCOL.HEADER_LENGTH, timeoutMs));
        const isData = (header.flags & VICPFlag.DATA) !== 0;
        const eoi = (header.flags & VICPFlag.EOI) !== 0;

        if (header.payloadLength > 0) {
          const payload = await reader.readExact(header.payloadLength, timeoutMs);
          if (isData) {
            chunks.push(payload);
            total += payload.length;
          }
        }

        frames++;
        logger.debug(
          `[VICP] frame ${frames}: op=0x${header.flags.toString(16).padStart(2, '0')} ` +
          `len=${header.payloadLength} total=${total} eoi=${eoi}`
        );

        if (eoi) {
          break;
        }
      }
    } catch (error) {
      if (error instanceof StreamClosedError) {
        endedBy = 'closed';
      } else if (error instanceof StreamTimeoutError) {
        endedBy = 'timeout';
      } else {
        throw error;
      }
      logger.info(`[VICP] Stream ended (${endedBy}) after ${frames} frame(s), ${total} bytes total`);
    }

    return { data: Buffer.concat(chunks, total), frames, endedBy };
  }
}
