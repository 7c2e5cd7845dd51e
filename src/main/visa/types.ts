/**
 * Structured instrument session, shaped after VISA.
 *
 * A ResourceManager opens resources by address; an InstrumentResource is one
 * open session. Backends (a VISA binding, a USB-TMC driver, the bundled raw
 * socket backend) implement both.
 */
export interface InstrumentResource {
  readonly address: string;
  /** Per-operation I/O timeout */
  timeoutMs: number;
  /** Text reads stop here; null switches reads to binary */
  readTermination: string | null;
  writeTermination: string;

  write(command: string): Promise<void>;
  read(): Promise<string>;
  query(command: string): Promise<string>;
  /** Raw bytes of one response, honouring readTermination */
  readRaw(): Promise<Buffer>;
  /** Write, wait `delayMs`, read a definite-length block and return its payload */
  queryBinaryValues(command: string, delayMs: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface ResourceManager {
  openResource(address: string, openTimeoutMs: number): Promise<InstrumentResource>;
  /** Addresses matching a VISA glob such as `USB?*::INSTR` */
  listResources(pattern: string): Promise<string[]>;
  close(): Promise<void>;
}

export type ResourceManagerFactory = () => ResourceManager;
