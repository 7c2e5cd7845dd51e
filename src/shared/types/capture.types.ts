/**
 * Logical endpoint a capture is aimed at. Fixed for the whole capture.
 */
export type CaptureTarget = NetworkTarget | DeviceTarget;

export interface NetworkTarget {
  kind: 'network';
  host: string;
  /** Explicit port hint; 0 or absent means "pick the SCPI default" */
  port?: number;
}

export type DeviceTarget =
  | { kind: 'device'; address: string }
  | { kind: 'device'; autoDiscover: true };

/**
 * One concrete way of reaching a target.
 */
export type Candidate = ResourceCandidate | RawSocketCandidate;

/** VISA-style resource string, e.g. `TCPIP::10.0.0.5::inst0::INSTR` */
export interface ResourceCandidate {
  kind: 'resource';
  address: string;
}

/** Direct TCP connection speaking VICP */
export interface RawSocketCandidate {
  kind: 'raw-socket';
  host: string;
  port: number;
  /** Abandon the attempt when the instrument identifies as another vendor */
  expectVendor?: VendorTag;
}

export enum VendorTag {
  LECROY = 'LECROY',
  TEKTRONIX = 'TEKTRONIX',
  KEYSIGHT = 'KEYSIGHT',
  RIGOL_SIGLENT = 'RIGOL_SIGLENT',
  UNKNOWN = 'UNKNOWN'
}

export type KnownVendor = Exclude<VendorTag, VendorTag.UNKNOWN>;

export interface InstrumentIdentity {
  /** Trimmed `*IDN?` response, empty when the query failed */
  raw: string;
  vendor: VendorTag;
}

/** Screenshot background. WHITE is the ink-saver rendering. */
export type ColorMode = 'WHITE' | 'BLACK';

export type EnvelopeKind = 'none' | 'ieee-block';

export interface ImageBlob {
  bytes: Buffer;
  envelope: EnvelopeKind;
}

export enum CaptureState {
  IDLE = 'IDLE',
  CONNECTING = 'CONNECTING',
  IDENTIFYING = 'IDENTIFYING',
  CONFIGURING = 'CONFIGURING',
  TRIGGERED = 'TRIGGERED',
  RECEIVING = 'RECEIVING',
  VALIDATING = 'VALIDATING',
  DONE = 'DONE',
  RETRY = 'RETRY',
  FAILED = 'FAILED'
}

export interface CaptureRequest {
  target: CaptureTarget;
  /** Raw user input; coerced to a ColorMode */
  colorMode: string;
  timeoutSeconds: number;
  /** Output path; a timestamp is inserted before the extension */
  outputPathTemplate: string;
}

/** Diagnostic record of one candidate attempt */
export interface AttemptRecord {
  candidate: Candidate;
  /** Last state reached before the attempt ended */
  reached: CaptureState;
  identity?: InstrumentIdentity;
  bytesReceived: number;
  errorCode?: string;
  error?: string;
  /** Set when this attempt was the forced LeCroy VICP downgrade */
  downgrade?: boolean;
}
