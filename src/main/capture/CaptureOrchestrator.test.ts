import { describe, it, expect, vi } from 'vitest';
import { CaptureOrchestrator } from './CaptureOrchestrator';
import type { ImageSink, StateChange } from './CaptureOrchestrator';
import { ConnectionResolver } from './ConnectionResolver';
import type { ConnectionResolverOptions } from './ConnectionResolver';
import { FakeOpener } from './test/FakeTransport';
import type { FakeTransportScript } from './test/FakeTransport';
import { FakeResourceManager } from '../visa/test/FakeResourceManager';
import { imageBytes } from '../vicp/test/vicpFrameFactory';
import { CaptureState, VendorTag } from '@shared/types/capture.types';
import type { CaptureRequest, CaptureTarget, ImageBlob } from '@shared/types/capture.types';
import { NO_SETTLE_DELAYS } from '@shared/constants';
import { CaptureAbortedError, CaptureFailedError, QueryError, StorageError } from '../utils/errors';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const LECROY_IDN = 'LECROY,WAVERUNNER8254M,LCRY0001,9.2.0';
const LECROY_SETUP_WHITE = 'HCSU DEV,BMP,FORMAT,PORTRAIT,BCKG,WHITE,DEST,REMOTE,PORT,NET';
const INST0 = 'TCPIP::10.0.0.5::inst0::INSTR';
const HISLIP = 'TCPIP::10.0.0.5::hislip0::INSTR';
const SOCKET = 'TCPIP::10.0.0.5::5025::SOCKET';
const VICP = '10.0.0.5:1861';
const SAVED_PATH = 'captures/shot_20261019_140509.png';

function bitmap(length: number): Buffer {
  const bytes = Buffer.alloc(length, 0x33);
  bytes.write('BM', 0, 'ascii');
  return bytes;
}

class RecordingSink implements ImageSink {
  public saved: Array<{ blob: ImageBlob; path: string }> = [];

  constructor(private readonly error?: Error) {}

  async persist(blob: ImageBlob, resolvedPath: string): Promise<string> {
    if (this.error) {
      throw this.error;
    }
    this.saved.push({ blob, path: resolvedPath });
    return resolvedPath;
  }
}

interface Harness {
  orchestrator: CaptureOrchestrator;
  opener: FakeOpener;
  sink: RecordingSink;
  states: CaptureState[];
}

function setup(
  scripts: Record<string, FakeTransportScript>,
  opts: { resolver?: ConnectionResolverOptions; sink?: RecordingSink; listings?: Record<string, string[]> } = {}
): Harness {
  const opener = new FakeOpener(scripts);
  const sink = opts.sink ?? new RecordingSink();
  const resolver = new ConnectionResolver(() => new FakeResourceManager({}, opts.listings), opts.resolver);
  const orchestrator = new CaptureOrchestrator(
    {
      opener,
      resolver,
      storage: sink,
      now: () => new Date(2026, 9, 19, 14, 5, 9),
      createId: () => 'capture-1',
    },
    { delays: NO_SETTLE_DELAYS }
  );
  const states: CaptureState[] = [];
  orchestrator.on('state-changed', (change: StateChange) => states.push(change.state));
  return { orchestrator, opener, sink, states };
}

function request(target: CaptureTarget, colorMode = 'WHITE'): CaptureRequest {
  return { target, colorMode, timeoutSeconds: 15, outputPathTemplate: 'captures/shot.png' };
}

const NETWORK: CaptureTarget = { kind: 'network', host: '10.0.0.5' };

describe('CaptureOrchestrator', () => {
  // ─── Happy path ─────────────────────────────────────────────

  it('captures from the first candidate that answers', async () => {
    const image = bitmap(5000);
    const { orchestrator, opener, sink, states } = setup({
      [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: image } },
    });

    const result = await orchestrator.capture(request(NETWORK));

    expect(result).toEqual({
      success: true,
      captureId: 'capture-1',
      path: SAVED_PATH,
      bytes: 5000,
      identity: { raw: LECROY_IDN, vendor: VendorTag.LECROY },
      candidate: { kind: 'resource', address: INST0 },
      attempts: [
        {
          candidate: { kind: 'resource', address: INST0 },
          reached: CaptureState.VALIDATING,
          identity: { raw: LECROY_IDN, vendor: VendorTag.LECROY },
          bytesReceived: 5000,
        },
      ],
      warnings: [],
    });
    expect(states).toEqual([
      CaptureState.CONNECTING,
      CaptureState.IDENTIFYING,
      CaptureState.CONFIGURING,
      CaptureState.TRIGGERED,
      CaptureState.RECEIVING,
      CaptureState.VALIDATING,
      CaptureState.DONE,
    ]);
    expect(orchestrator.getState()).toBe(CaptureState.DONE);
    expect(sink.saved).toEqual([{ blob: { bytes: image, envelope: 'none' }, path: SAVED_PATH }]);
    expect(opener.timeouts).toEqual([15000]);
    expect(opener.transports[0].closeCount).toBe(1);
  });

  it('strips the block header before saving', async () => {
    const png = imageBytes(300);
    const { orchestrator, sink } = setup({
      [INST0]: {
        idn: 'RIGOL TECHNOLOGIES,DS1104Z,DS1ZA1,00.04.04',
        raw: { ':DISP:DATA? ON,OFF,PNG': Buffer.concat([Buffer.from('#3300'), png, Buffer.from('\n')]) },
      },
    });

    const result = await orchestrator.capture(request(NETWORK));

    expect(result.success && result.bytes).toBe(300);
    expect(sink.saved[0].blob.bytes.equals(png)).toBe(true);
  });

  // ─── LeCroy VICP downgrade ──────────────────────────────────

  describe('LeCroy downgrade', () => {
    it('retries a short LeCroy image over raw VICP on the same host', async () => {
      const image = bitmap(5000);
      const { orchestrator, opener } = setup({
        [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: imageBytes(40) } },
        [VICP]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: image } },
      });

      const result = await orchestrator.capture(request(NETWORK));

      expect(opener.opened).toEqual([INST0, VICP]);
      expect(opener.transports[1].kind).toBe('vicp');
      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.candidate).toEqual({ kind: 'raw-socket', host: '10.0.0.5', port: 1861 });
      expect(result.bytes).toBe(5000);
      expect(result.attempts).toHaveLength(2);
      expect(result.attempts[0]).toEqual({
        candidate: { kind: 'resource', address: INST0 },
        reached: CaptureState.VALIDATING,
        identity: { raw: LECROY_IDN, vendor: VendorTag.LECROY },
        bytesReceived: 40,
        errorCode: 'INSUFFICIENT_DATA',
        error: 'Image data too small (40 bytes, need 100)',
      });
      expect(result.attempts[1].downgrade).toBe(true);
      expect(opener.transports.map((t) => t.closeCount)).toEqual([1, 1]);
    });

    it('moves the VICP endpoint forward instead of trying it twice', async () => {
      const { orchestrator, opener } = setup({
        [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: imageBytes(40) } },
        [VICP]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: imageBytes(40) } },
      });

      const result = await orchestrator.capture(request({ kind: 'network', host: '10.0.0.5', port: 1861 }));

      expect(result.success).toBe(false);
      expect(opener.opened).toEqual([INST0, VICP, HISLIP]);
    });

    it('is skipped when the VICP endpoint was already attempted', async () => {
      const { orchestrator, opener } = setup(
        { [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: imageBytes(40) } } },
        { resolver: { probeVicpFirst: true } }
      );

      const result = await orchestrator.capture(request(NETWORK));

      expect(opener.opened).toEqual([VICP, INST0, HISLIP, SOCKET]);
      expect(result.success).toBe(false);
      expect(result.attempts.some((attempt) => attempt.downgrade)).toBe(false);
    });

    it('happens at most once per capture', async () => {
      const lecroyShort: FakeTransportScript = { idn: LECROY_IDN, raw: { SCREEN_DUMP: imageBytes(40) } };
      const { orchestrator, opener } = setup({
        [INST0]: lecroyShort,
        [VICP]: { idn: LECROY_IDN },
        [HISLIP]: lecroyShort,
      });

      await orchestrator.capture(request(NETWORK));

      expect(opener.opened).toEqual([INST0, VICP, HISLIP, SOCKET]);
    });

    it('does not apply to other vendors', async () => {
      const { orchestrator, opener } = setup({
        [INST0]: {
          idn: 'KEYSIGHT TECHNOLOGIES,DSOX3024T,MY1,7.50',
          blocks: { ':DISP:DATA? PNG,INKS,COL': imageBytes(40) },
        },
      });

      await orchestrator.capture(request(NETWORK));

      expect(opener.opened).toEqual([INST0, HISLIP, SOCKET]);
    });

    it('applies when the setup command itself fails', async () => {
      const { orchestrator, opener } = setup({
        [INST0]: { idn: LECROY_IDN, writeErrors: { [LECROY_SETUP_WHITE]: new QueryError('VI_ERROR_IO') } },
      });

      const result = await orchestrator.capture(request(NETWORK));

      expect(result.attempts[0].reached).toBe(CaptureState.CONFIGURING);
      expect(opener.opened[1]).toBe(VICP);
    });
  });

  // ─── Vendor handling ────────────────────────────────────────

  it('probes vendors in order when the instrument does not identify', async () => {
    const png = imageBytes(300);
    const address = 'USB0::0x1AB1::0x04CE::DS1ZA1::INSTR';
    const { orchestrator, opener } = setup({
      [address]: { raw: { ':DISP:DATA? ON,OFF,PNG': png } },
    });

    const result = await orchestrator.capture(request({ kind: 'device', address }));

    expect(result.success).toBe(true);
    expect(result.attempts[0].identity).toEqual({ raw: '', vendor: VendorTag.UNKNOWN });
    expect(opener.transports[0].written).toEqual([
      ':DISP:DATA PNG,INKS,COL',
      ':DISP:DATA? PNG,INKS,COL',
      ':DISP:DATA? ON,OFF,PNG',
    ]);
  });

  it('coerces an unsupported color to WHITE and reports it', async () => {
    const { orchestrator, opener } = setup({
      [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: bitmap(5000) } },
    });

    const result = await orchestrator.capture(request(NETWORK, 'GREEN'));

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(["Unsupported color mode 'GREEN', using WHITE"]);
    expect(opener.transports[0].written[0]).toBe(LECROY_SETUP_WHITE);
  });

  it('rejects a VICP probe that answers as another vendor', async () => {
    const { orchestrator, opener } = setup(
      {
        [VICP]: { idn: 'KEYSIGHT TECHNOLOGIES,DSOX3024T,MY1,7.50' },
        [INST0]: {
          idn: 'KEYSIGHT TECHNOLOGIES,DSOX3024T,MY1,7.50',
          blocks: { ':DISP:DATA? PNG,INKS,COL': imageBytes(2000) },
        },
      },
      { resolver: { probeVicpFirst: true } }
    );

    const result = await orchestrator.capture(request(NETWORK));

    expect(result.success).toBe(true);
    expect(result.attempts[0].errorCode).toBe('QUERY_ERROR');
    expect(result.attempts[0].error).toBe(`${VICP} identified as KEYSIGHT, expected LECROY`);
    expect(opener.transports[0].written).toEqual([]);
  });

  // ─── Retry and failure ──────────────────────────────────────

  it('moves on when a candidate refuses the connection', async () => {
    const { orchestrator, states } = setup({
      [HISLIP]: { idn: 'TEKTRONIX,MSO54,C0123,CF:91.1CT', raw: { 'HARDcopy START': bitmap(800) } },
    });

    const result = await orchestrator.capture(request(NETWORK));

    expect(result.success).toBe(true);
    expect(result.attempts[0]).toEqual({
      candidate: { kind: 'resource', address: INST0 },
      reached: CaptureState.CONNECTING,
      bytesReceived: 0,
      errorCode: 'CONNECT_ERROR',
      error: `Failed to connect to ${INST0}: connect ECONNREFUSED`,
    });
    expect(states.slice(0, 3)).toEqual([CaptureState.CONNECTING, CaptureState.RETRY, CaptureState.CONNECTING]);
  });

  it('fails once every candidate is exhausted', async () => {
    const { orchestrator, states } = setup({});

    const result = await orchestrator.capture(request(NETWORK));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failure).toBeInstanceOf(CaptureFailedError);
    expect(result.failure.message).toBe(
      `No candidate produced an image (3 attempted): Failed to connect to ${SOCKET}: connect ECONNREFUSED`
    );
    expect(result.attempts.map((attempt) => attempt.errorCode)).toEqual([
      'CONNECT_ERROR',
      'CONNECT_ERROR',
      'CONNECT_ERROR',
    ]);
    expect(states[states.length - 1]).toBe(CaptureState.FAILED);
  });

  it('fails without attempts when no USB instrument is attached', async () => {
    const { orchestrator, opener } = setup({});

    const result = await orchestrator.capture(request({ kind: 'device', autoDiscover: true }));

    expect(result.success).toBe(false);
    expect(!result.success && result.failure.message).toBe('No instrument found for capture target');
    expect(result.attempts).toEqual([]);
    expect(opener.opened).toEqual([]);
  });

  it('uses the discovered USB instrument', async () => {
    const address = 'USB0::0x05FF::0x1023::LCRY1::INST';
    const { orchestrator, opener } = setup(
      { [address]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: bitmap(900) } } },
      { listings: { 'USB?*::INST': [address] } }
    );

    const result = await orchestrator.capture(request({ kind: 'device', autoDiscover: true }));

    expect(result.success).toBe(true);
    expect(opener.opened).toEqual([address]);
  });

  it('reports a save failure as a failed capture', async () => {
    const sink = new RecordingSink(new StorageError('Failed to write image to captures/shot.png'));
    const { orchestrator } = setup(
      { [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: bitmap(5000) } } },
      { sink }
    );

    const result = await orchestrator.capture(request(NETWORK));

    expect(!result.success && result.failure.message).toBe(
      'Image received but could not be saved: Failed to write image to captures/shot.png'
    );
    expect(orchestrator.getState()).toBe(CaptureState.FAILED);
  });

  // ─── Cancellation ───────────────────────────────────────────

  describe('abort', () => {
    it('does nothing when already aborted', async () => {
      const { orchestrator, opener } = setup({ [INST0]: { idn: LECROY_IDN } });
      const controller = new AbortController();
      controller.abort();

      const result = await orchestrator.capture(request(NETWORK), controller.signal);

      expect(!result.success && result.failure).toBeInstanceOf(CaptureAbortedError);
      expect(opener.opened).toEqual([]);
    });

    it('stops mid-attempt and closes the transport', async () => {
      const { orchestrator, opener } = setup({
        [INST0]: { idn: LECROY_IDN, raw: { SCREEN_DUMP: bitmap(5000) } },
      });
      const controller = new AbortController();
      orchestrator.on('state-changed', (change: StateChange) => {
        if (change.state === CaptureState.CONFIGURING) controller.abort();
      });

      const result = await orchestrator.capture(request(NETWORK), controller.signal);

      expect(!result.success && result.failure).toBeInstanceOf(CaptureAbortedError);
      expect(result.attempts).toHaveLength(1);
      expect(result.attempts[0].errorCode).toBe('CAPTURE_ABORTED');
      expect(result.attempts[0].reached).toBe(CaptureState.CONFIGURING);
      expect(opener.opened).toEqual([INST0]);
      expect(opener.transports[0].written).toEqual([LECROY_SETUP_WHITE]);
      expect(opener.transports[0].closeCount).toBe(1);
      expect(orchestrator.getState()).toBe(CaptureState.CONFIGURING);
    });
  });
});
