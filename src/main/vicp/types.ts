/** Operation byte flags of a VICP header */
export enum VICPFlag {
  DATA = 0x80,
  REMOTE = 0x40,
  LOCKOUT = 0x20,
  CLEAR = 0x10,
  SRQ = 0x08,
  REQSEND = 0x04,
  EOI = 0x01
}

export interface VICPFrameHeader {
  flags: number;
  version: number;
  sequence: number;
  payloadLength: number;
}

export interface VICPFrame extends VICPFrameHeader {
  payload: Buffer;
}

/** Anything that can hand back exactly `length` bytes, waiting at most `timeoutMs` */
export interface FrameReader {
  readExact(length: number, timeoutMs: number): Promise<Buffer>;
}

export type StreamEnd = 'eoi' | 'closed' | 'timeout';

export interface VICPStreamResult {
  /** Concatenated DATA payloads in arrival order */
  data: Buffer;
  /** Complete frames read, DATA or not */
  frames: number;
  endedBy: StreamEnd;
}

export const VICP_PROTOCOL = {
  HEADER_LENGTH: 8,
  VERSION: 0x01,
  /** DATA | REMOTE | EOI */
  COMMAND_FLAGS: 0x80 | 0x40 | 0x01,
  MAX_SEQUENCE: 255,
  LENGTH_OFFSET: 4
} as const;
