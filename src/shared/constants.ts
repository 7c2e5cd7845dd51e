export const APP_VERSION = '0.1.0';

export const CAPTURE = {
  /** LeCroy VICP listens here */
  VICP_PORT: 1861,
  /** Raw SCPI socket (Keysight, Rigol, Siglent, Tektronix) */
  SCPI_PORT: 5025,
  HTTP_PORT: 80,
  DEFAULT_TIMEOUT_SECONDS: 15,
  /** Anything shorter is not an image. Heuristic, kept configurable. */
  MIN_IMAGE_BYTES: 100,
  /** Rigol/Siglent retry the legacy query below this size */
  RIGOL_FALLBACK_MIN_BYTES: 10,
  DEFAULT_OUTPUT_TEMPLATE: 'captures/scope_screenshot.png',
  REACHABILITY_PORTS: [1861, 5025, 80],
  REACHABILITY_TIMEOUT_MS: 3000,
} as const;

/**
 * Instrument-side rendering latency. The scope drops or truncates the image
 * when the next command or read arrives sooner than these.
 */
export const SETTLE_DELAYS = {
  VICP_IDENTIFY: 200,
  LECROY_SETUP: 300,
  LECROY_DUMP: 1500,
  LECROY_VICP_SETUP: 500,
  LECROY_VICP_DUMP: 4000,
  TEKTRONIX_SETUP: 200,
  TEKTRONIX_HARDCOPY: 2000,
  KEYSIGHT_SETUP: 500,
  KEYSIGHT_QUERY: 500,
  RIGOL_QUERY: 500,
} as const;

export type SettleDelays = { [K in keyof typeof SETTLE_DELAYS]: number };

/** Zero-latency delays for fixtures and simulators */
export const NO_SETTLE_DELAYS: SettleDelays = {
  VICP_IDENTIFY: 0,
  LECROY_SETUP: 0,
  LECROY_DUMP: 0,
  LECROY_VICP_SETUP: 0,
  LECROY_VICP_DUMP: 0,
  TEKTRONIX_SETUP: 0,
  TEKTRONIX_HARDCOPY: 0,
  KEYSIGHT_SETUP: 0,
  KEYSIGHT_QUERY: 0,
  RIGOL_QUERY: 0,
};

/**
 * USB instrument discovery patterns, most specific first.
 * `::INST` is how the LeCroy IVI driver registers its scopes.
 */
export const USB_RESOURCE_PATTERNS = ['USB?*::INSTR', 'USB?*::INST', 'USB?*'] as const;

export const LAN_SUBPROTOCOLS = {
  VXI11: 'inst0',
  HISLIP: 'hislip0',
} as const;

/** Transport thresholds: file keeps info and up, console everything */
export const LOG_LEVELS = {
  INFO: 'info',
  DEBUG: 'debug'
} as const;
