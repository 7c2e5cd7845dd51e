import { parseArgs } from 'util';
import type { CaptureRequest, CaptureTarget } from '@shared/types/capture.types';
import { CAPTURE } from '@shared/constants';
import { ConfigError, getErrorMessage } from '../utils/errors';

export interface HttpCredentials {
  user: string;
  password: string;
}

export interface CaptureConfig {
  request: CaptureRequest;
  minImageBytes: number;
  probeVicpFirst: boolean;
  /** Present when --user or --password was given */
  credentials?: HttpCredentials;
}

export type ParsedCommand = { kind: 'help' } | { kind: 'capture'; config: CaptureConfig };

export const USAGE = `Usage: scope-capture (--host <ip> [--port <n>] | --usb | --resource <address>) [options]

Target
  --host <ip>           Instrument on the network (env SCOPE_HOST)
  --port <n>            Raw socket port; 0 picks ${CAPTURE.SCPI_PORT}, ${CAPTURE.VICP_PORT} speaks VICP
  --usb                 First USB instrument found
  --resource <address>  Exact resource string, e.g. USB0::0x05FF::0x1023::1234::INSTR (env SCOPE_USB_RESOURCE)

Options
  --color <WHITE|BLACK> Screenshot background (default WHITE)
  --timeout <seconds>   Per-read timeout (default ${CAPTURE.DEFAULT_TIMEOUT_SECONDS})
  --output <path>       Output path; a timestamp is added (env SCOPE_OUTPUT, default ${CAPTURE.DEFAULT_OUTPUT_TEMPLATE})
  --no-probe-vicp       Skip the LeCroy VICP attempt on ${CAPTURE.VICP_PORT} that runs first by default
  --min-bytes <n>       Smallest response accepted as an image (default ${CAPTURE.MIN_IMAGE_BYTES})
  --user <name>         HTTP Basic-auth user for the instrument web server
  --password <secret>   HTTP Basic-auth password
  -h, --help            Show this help`;

function parseInteger(flag: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`Invalid --${flag} '${raw}': expected an integer from ${min} to ${max}`);
  }
  return value;
}

function networkTarget(host: string, port: string | undefined): CaptureTarget {
  if (host.trim() === '') {
    throw new ConfigError('Empty --host');
  }
  if (port === undefined) {
    return { kind: 'network', host };
  }
  return { kind: 'network', host, port: parseInteger('port', port, 0, 65535) };
}

function deviceTarget(address: string): CaptureTarget {
  if (address.trim() === '') {
    throw new ConfigError('Empty --resource address');
  }
  return { kind: 'device', address };
}

/** Flags win over the environment; at most one target flag */
function resolveTarget(
  values: { host?: string; port?: string; usb?: boolean; resource?: string },
  env: NodeJS.ProcessEnv
): CaptureTarget {
  const flagged = [values.host !== undefined, values.usb === true, values.resource !== undefined];
  if (flagged.filter(Boolean).length > 1) {
    throw new ConfigError('Choose one of --host, --usb or --resource');
  }

  if (values.usb) {
    return { kind: 'device', autoDiscover: true };
  }
  if (values.resource !== undefined) {
    return deviceTarget(values.resource);
  }
  if (values.host !== undefined) {
    return networkTarget(values.host, values.port);
  }
  if (env.SCOPE_HOST) {
    return networkTarget(env.SCOPE_HOST, values.port);
  }
  if (env.SCOPE_USB_RESOURCE) {
    return deviceTarget(env.SCOPE_USB_RESOURCE);
  }
  throw new ConfigError('No instrument given: pass --host, --usb or --resource');
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        host: { type: 'string' },
        port: { type: 'string' },
        usb: { type: 'boolean' },
        resource: { type: 'string' },
        color: { type: 'string' },
        timeout: { type: 'string' },
        output: { type: 'string' },
        'probe-vicp': { type: 'boolean' },
        'no-probe-vicp': { type: 'boolean' },
        'min-bytes': { type: 'string' },
        user: { type: 'string' },
        password: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ConfigError(getErrorMessage(error));
  }
}

/**
 * Parse command-line arguments into a capture configuration. Every problem
 * is reported as a ConfigError before any connection is attempted.
 */
export function parseCaptureArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCommand {
  const { values } = readArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  if (values['probe-vicp'] && values['no-probe-vicp']) {
    throw new ConfigError('Choose one of --probe-vicp or --no-probe-vicp');
  }

  const target = resolveTarget(values, env);
  const timeoutSeconds = values.timeout !== undefined
    ? parseInteger('timeout', values.timeout, 1, 3600)
    : CAPTURE.DEFAULT_TIMEOUT_SECONDS;
  const minImageBytes = values['min-bytes'] !== undefined
    ? parseInteger('min-bytes', values['min-bytes'], 1, Number.MAX_SAFE_INTEGER)
    : CAPTURE.MIN_IMAGE_BYTES;

  const config: CaptureConfig = {
    request: {
      target,
      colorMode: values.color ?? 'WHITE',
      timeoutSeconds,
      outputPathTemplate: values.output ?? env.SCOPE_OUTPUT ?? CAPTURE.DEFAULT_OUTPUT_TEMPLATE,
    },
    minImageBytes,
    probeVicpFirst: !values['no-probe-vicp'],
  };

  if (values.user !== undefined || values.password !== undefined) {
    config.credentials = { user: values.user ?? '', password: values.password ?? '' };
  }

  return { kind: 'capture', config };
}
