import type { Candidate } from '@shared/types/capture.types';

export type TransportKind = 'resource' | 'vicp';

/**
 * Uniform session over one candidate. Implementations throw the typed errors
 * from utils/errors; the orchestrator turns them into step results.
 */
export interface InstrumentTransport {
  readonly kind: TransportKind;
  /** Human-readable endpoint for logs */
  readonly label: string;
  /** Trimmed `*IDN?` response */
  identify(): Promise<string>;
  write(command: string): Promise<void>;
  /** One binary response, text termination disabled */
  readRaw(): Promise<Buffer>;
  /** Write, settle, read a definite-length block; returns the block payload */
  queryBinaryBlock(command: string, settleMs: number): Promise<Buffer>;
  /** Idempotent */
  close(): Promise<void>;
}

export interface TransportOpener {
  open(candidate: Candidate, timeoutMs: number): Promise<InstrumentTransport>;
}
