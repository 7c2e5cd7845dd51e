import { describe, it, expect } from 'vitest';
import { parseCaptureArgs } from './captureConfig';
import type { CaptureConfig } from './captureConfig';
import { ConfigError } from '../utils/errors';

function configOf(argv: string[], env: NodeJS.ProcessEnv = {}): CaptureConfig {
  const parsed = parseCaptureArgs(argv, env);
  if (parsed.kind !== 'capture') {
    throw new Error(`expected a capture command, got ${parsed.kind}`);
  }
  return parsed.config;
}

describe('parseCaptureArgs', () => {
  it('returns help for --help and -h', () => {
    expect(parseCaptureArgs(['--help'], {})).toEqual({ kind: 'help' });
    expect(parseCaptureArgs(['-h', '--host', '10.0.0.5'], {})).toEqual({ kind: 'help' });
  });

  it('fills in defaults for a bare host', () => {
    expect(configOf(['--host', '10.0.0.5'])).toEqual({
      request: {
        target: { kind: 'network', host: '10.0.0.5' },
        colorMode: 'WHITE',
        timeoutSeconds: 15,
        outputPathTemplate: 'captures/scope_screenshot.png',
      },
      minImageBytes: 100,
      probeVicpFirst: true,
    });
  });

  it('carries an explicit port', () => {
    expect(configOf(['--host', '10.0.0.5', '--port', '1861']).request.target).toEqual({
      kind: 'network',
      host: '10.0.0.5',
      port: 1861,
    });
  });

  it('accepts port 0', () => {
    expect(configOf(['--host', '10.0.0.5', '--port', '0']).request.target).toEqual({
      kind: 'network',
      host: '10.0.0.5',
      port: 0,
    });
  });

  it('maps --usb to discovery', () => {
    expect(configOf(['--usb']).request.target).toEqual({ kind: 'device', autoDiscover: true });
  });

  it('maps --resource to an explicit address', () => {
    expect(configOf(['--resource', 'USB0::0x05FF::0x1023::1234::INSTR']).request.target).toEqual({
      kind: 'device',
      address: 'USB0::0x05FF::0x1023::1234::INSTR',
    });
  });

  it('passes the remaining options through', () => {
    const config = configOf([
      '--host', '10.0.0.5',
      '--color', 'black',
      '--timeout', '30',
      '--output', 'out/shot.png',
      '--no-probe-vicp',
      '--min-bytes', '2048',
    ]);

    expect(config.request.colorMode).toBe('black');
    expect(config.request.timeoutSeconds).toBe(30);
    expect(config.request.outputPathTemplate).toBe('out/shot.png');
    expect(config.probeVicpFirst).toBe(false);
    expect(config.minImageBytes).toBe(2048);
  });

  it('tries VICP first unless told not to', () => {
    expect(configOf(['--host', '10.0.0.5']).probeVicpFirst).toBe(true);
    expect(configOf(['--host', '10.0.0.5', '--probe-vicp']).probeVicpFirst).toBe(true);
    expect(configOf(['--host', '10.0.0.5', '--no-probe-vicp']).probeVicpFirst).toBe(false);
  });

  it('collects HTTP credentials', () => {
    expect(configOf(['--host', '10.0.0.5', '--user', 'admin', '--password', 'test-secret']).credentials)
      .toEqual({ user: 'admin', password: 'test-secret' });
    expect(configOf(['--host', '10.0.0.5', '--password', 'test-secret']).credentials)
      .toEqual({ user: '', password: 'test-secret' });
    expect(configOf(['--host', '10.0.0.5']).credentials).toBeUndefined();
  });

  describe('environment', () => {
    it('falls back to SCOPE_HOST', () => {
      expect(configOf(['--port', '5025'], { SCOPE_HOST: '10.0.0.7' }).request.target).toEqual({
        kind: 'network',
        host: '10.0.0.7',
        port: 5025,
      });
    });

    it('falls back to SCOPE_USB_RESOURCE', () => {
      expect(configOf([], { SCOPE_USB_RESOURCE: 'USB0::1::2::3::INSTR' }).request.target).toEqual({
        kind: 'device',
        address: 'USB0::1::2::3::INSTR',
      });
    });

    it('prefers SCOPE_HOST over SCOPE_USB_RESOURCE', () => {
      const env = { SCOPE_HOST: '10.0.0.7', SCOPE_USB_RESOURCE: 'USB0::1::2::3::INSTR' };
      expect(configOf([], env).request.target).toEqual({ kind: 'network', host: '10.0.0.7' });
    });

    it('lets flags win over the environment', () => {
      expect(configOf(['--usb'], { SCOPE_HOST: '10.0.0.7' }).request.target).toEqual({
        kind: 'device',
        autoDiscover: true,
      });
    });

    it('takes the output path from SCOPE_OUTPUT', () => {
      expect(configOf(['--usb'], { SCOPE_OUTPUT: 'lab/trace.png' }).request.outputPathTemplate)
        .toBe('lab/trace.png');
      expect(configOf(['--usb', '--output', 'cli.png'], { SCOPE_OUTPUT: 'lab/trace.png' }).request.outputPathTemplate)
        .toBe('cli.png');
    });
  });

  describe('errors', () => {
    it('requires a target', () => {
      expect(() => parseCaptureArgs([], {})).toThrow(
        new ConfigError('No instrument given: pass --host, --usb or --resource')
      );
    });

    it('rejects more than one target flag', () => {
      expect(() => parseCaptureArgs(['--host', '10.0.0.5', '--usb'], {})).toThrow(
        'Choose one of --host, --usb or --resource'
      );
      expect(() => parseCaptureArgs(['--usb', '--resource', 'USB0::1::2::3::INSTR'], {})).toThrow(
        'Choose one of --host, --usb or --resource'
      );
    });

    it('rejects contradictory VICP flags', () => {
      expect(() => parseCaptureArgs(['--usb', '--probe-vicp', '--no-probe-vicp'], {})).toThrow(
        'Choose one of --probe-vicp or --no-probe-vicp'
      );
    });

    it('rejects empty addresses', () => {
      expect(() => parseCaptureArgs(['--resource', ''], {})).toThrow('Empty --resource address');
      expect(() => parseCaptureArgs(['--host', ' '], {})).toThrow('Empty --host');
    });

    it('rejects ports out of range', () => {
      expect(() => parseCaptureArgs(['--host', '10.0.0.5', '--port', '70000'], {})).toThrow(
        "Invalid --port '70000': expected an integer from 0 to 65535"
      );
      expect(() => parseCaptureArgs(['--host', '10.0.0.5', '--port', 'vicp'], {})).toThrow(
        "Invalid --port 'vicp': expected an integer from 0 to 65535"
      );
    });

    it('rejects a zero or fractional timeout', () => {
      expect(() => parseCaptureArgs(['--usb', '--timeout', '0'], {})).toThrow(
        "Invalid --timeout '0': expected an integer from 1 to 3600"
      );
      expect(() => parseCaptureArgs(['--usb', '--timeout', '2.5'], {})).toThrow(
        "Invalid --timeout '2.5': expected an integer from 1 to 3600"
      );
    });

    it('rejects a non-positive minimum size', () => {
      expect(() => parseCaptureArgs(['--usb', '--min-bytes', '0'], {})).toThrow(ConfigError);
    });

    it('reports unknown options as ConfigError', () => {
      expect(() => parseCaptureArgs(['--usb', '--bogus'], {})).toThrow(ConfigError);
      expect(() => parseCaptureArgs(['--usb', '--bogus'], {})).toThrow(/Unknown option '--bogus'/);
    });

    it('rejects positional arguments', () => {
      expect(() => parseCaptureArgs(['10.0.0.5'], {})).toThrow(ConfigError);
    });
  });
});
