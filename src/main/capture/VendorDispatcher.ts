import { VendorTag, CaptureState } from '@shared/types/capture.types';
import type { ColorMode, EnvelopeKind, ImageBlob, KnownVendor } from '@shared/types/capture.types';
import { CAPTURE, SETTLE_DELAYS } from '@shared/constants';
import type { SettleDelays } from '@shared/constants';
import type { InstrumentTransport, TransportKind } from '../transport/types';
import { CaptureAbortedError, QueryError } from '../utils/errors';
import { delay } from '../utils/timing';
import { logger } from '../utils/logger';
import { attemptStep, fail, ok } from './types';
import type { StepResult } from './types';

// ─── Plan model ─────────────────────────────────────────────────────

export type PlanPhase = 'configure' | 'trigger' | 'receive';

export type PlanStep =
  | { kind: 'write'; command: string; settleMs: number; phase: 'configure' | 'trigger' }
  /** Binary read with text termination disabled */
  | { kind: 'read-raw' }
  /** Write, settle, read a definite-length block */
  | { kind: 'query-block'; command: string; settleMs: number };

export interface PlanFallback {
  /** Run the fallback steps when the main read returns fewer bytes */
  minBytes: number;
  steps: PlanStep[];
}

export interface VendorPlan {
  vendor: KnownVendor;
  steps: PlanStep[];
  /** Framing the instrument wraps around the image */
  envelope: EnvelopeKind;
  fallback?: PlanFallback;
}

// ─── Vendor command sets ────────────────────────────────────────────

type PlanBuilder = (colorMode: ColorMode, transportKind: TransportKind, delays: SettleDelays) => VendorPlan;

const write = (command: string, settleMs: number, phase: 'configure' | 'trigger'): PlanStep => ({
  kind: 'write',
  command,
  settleMs,
  phase,
});

const READ_RAW: PlanStep = { kind: 'read-raw' };

const PLAN_BUILDERS: Record<KnownVendor, PlanBuilder> = {
  [VendorTag.LECROY]: (colorMode, transportKind, delays) => {
    // VICP sessions need longer for the scope to render and queue the dump
    const overVicp = transportKind === 'vicp';
    return {
      vendor: VendorTag.LECROY,
      envelope: 'none',
      steps: [
        write(
          `HCSU DEV,BMP,FORMAT,PORTRAIT,BCKG,${colorMode},DEST,REMOTE,PORT,NET`,
          overVicp ? delays.LECROY_VICP_SETUP : delays.LECROY_SETUP,
          'configure'
        ),
        write('SCREEN_DUMP', overVicp ? delays.LECROY_VICP_DUMP : delays.LECROY_DUMP, 'trigger'),
        READ_RAW,
      ],
    };
  },

  [VendorTag.TEKTRONIX]: (colorMode, _transportKind, delays) => ({
    vendor: VendorTag.TEKTRONIX,
    envelope: 'none',
    steps: [
      write('HARDcopy:PORT GPIB', 0, 'configure'),
      write('HARDcopy:FORMat BMP', 0, 'configure'),
      write(`HARDcopy:INKSaver ${colorMode === 'WHITE' ? 'ON' : 'OFF'}`, delays.TEKTRONIX_SETUP, 'configure'),
      write('HARDcopy START', delays.TEKTRONIX_HARDCOPY, 'trigger'),
      READ_RAW,
    ],
  }),

  [VendorTag.KEYSIGHT]: (colorMode, _transportKind, delays) => {
    const scheme = colorMode === 'WHITE' ? 'INKS' : 'SCR';
    return {
      vendor: VendorTag.KEYSIGHT,
      envelope: 'none',
      steps: [
        write(`:DISP:DATA PNG,${scheme},COL`, delays.KEYSIGHT_SETUP, 'configure'),
        { kind: 'query-block', command: `:DISP:DATA? PNG,${scheme},COL`, settleMs: delays.KEYSIGHT_QUERY },
      ],
    };
  },

  [VendorTag.RIGOL_SIGLENT]: (colorMode, _transportKind, delays) => ({
    vendor: VendorTag.RIGOL_SIGLENT,
    envelope: 'ieee-block',
    steps: [
      write(`:DISP:DATA? ON,${colorMode === 'WHITE' ? 'OFF' : 'ON'},PNG`, delays.RIGOL_QUERY, 'trigger'),
      READ_RAW,
    ],
    fallback: {
      minBytes: CAPTURE.RIGOL_FALLBACK_MIN_BYTES,
      steps: [write(':DISP:DATA?', delays.RIGOL_QUERY, 'trigger'), READ_RAW],
    },
  }),
};

/** Order in which an unidentified instrument is probed */
const UNKNOWN_VENDOR_ORDER: readonly KnownVendor[] = [
  VendorTag.KEYSIGHT,
  VendorTag.RIGOL_SIGLENT,
  VendorTag.LECROY,
  VendorTag.TEKTRONIX,
];

/**
 * Command plans for a vendor. A known vendor gets exactly one plan; UNKNOWN
 * gets every vendor's plan in probing order.
 */
export function commandsFor(
  vendor: VendorTag,
  colorMode: ColorMode,
  transportKind: TransportKind = 'resource',
  delays: SettleDelays = SETTLE_DELAYS
): VendorPlan[] {
  if (vendor === VendorTag.UNKNOWN) {
    return UNKNOWN_VENDOR_ORDER.map((known) => PLAN_BUILDERS[known](colorMode, transportKind, delays));
  }
  return [PLAN_BUILDERS[vendor](colorMode, transportKind, delays)];
}

// ─── Plan execution ─────────────────────────────────────────────────

const PHASE_STATES: Record<PlanPhase, CaptureState> = {
  configure: CaptureState.CONFIGURING,
  trigger: CaptureState.TRIGGERED,
  receive: CaptureState.RECEIVING,
};

const PHASE_ORDER: readonly PlanPhase[] = ['configure', 'trigger', 'receive'];

export interface PlanRunOptions {
  minImageBytes: number;
  /**
   * Called once per capture state the plans move through, in order. Returning
   * false stops execution with CaptureAbortedError.
   */
  onState?: (state: CaptureState) => boolean;
  /** Checked before each plan; plans past the first add no state change */
  signal?: AbortSignal;
}

/**
 * Advances through the plan phases without ever stepping back, so probing
 * several plans on one transport still yields a forward-only state sequence.
 */
class PhaseTracker {
  private reached = -1;

  constructor(private readonly onState: (state: CaptureState) => boolean) {}

  enter(phase: PlanPhase): boolean {
    const target = PHASE_ORDER.indexOf(phase);
    while (this.reached < target) {
      this.reached++;
      if (!this.onState(PHASE_STATES[PHASE_ORDER[this.reached]])) {
        return false;
      }
    }
    return true;
  }
}

async function runSteps(
  transport: InstrumentTransport,
  steps: PlanStep[],
  tracker: PhaseTracker
): Promise<StepResult<Buffer>> {
  let received: Buffer | null = null;

  for (const step of steps) {
    if (step.kind === 'write') {
      if (!tracker.enter(step.phase)) return fail(new CaptureAbortedError());
      const sent = await attemptStep(() => transport.write(step.command));
      if (!sent.success) return sent;
      await delay(step.settleMs);
      continue;
    }

    if (!tracker.enter('trigger') || !tracker.enter('receive')) {
      return fail(new CaptureAbortedError());
    }
    const read = step.kind === 'read-raw'
      ? await attemptStep(() => transport.readRaw())
      : await attemptStep(() => transport.queryBinaryBlock(step.command, step.settleMs));
    if (!read.success) return read;
    received = read.data;
  }

  if (received === null) {
    return fail(new QueryError('Command plan has no read step'));
  }
  return ok(received);
}

/** Run one plan, including its short-read fallback */
async function runPlan(
  transport: InstrumentTransport,
  plan: VendorPlan,
  tracker: PhaseTracker
): Promise<StepResult<ImageBlob>> {
  let result = await runSteps(transport, plan.steps, tracker);

  if (result.success && plan.fallback && result.data.length < plan.fallback.minBytes) {
    logger.warn(`[${plan.vendor}] Only ${result.data.length} bytes, retrying with fallback query`);
    result = await runSteps(transport, plan.fallback.steps, tracker);
  }

  if (!result.success) {
    return result;
  }
  return ok({ bytes: result.data, envelope: plan.envelope });
}

/**
 * Run plans in order until one yields at least `minImageBytes`. Plans that
 * fail are skipped. When none qualifies, the largest short result is
 * returned for validation to reject, or the last failure if nothing was read.
 */
export async function runPlans(
  transport: InstrumentTransport,
  plans: VendorPlan[],
  options: PlanRunOptions
): Promise<StepResult<ImageBlob>> {
  const tracker = new PhaseTracker(options.onState ?? (() => true));
  let best: ImageBlob | null = null;
  let lastFailure: StepResult<ImageBlob> = fail(new QueryError('No command plan to run'));

  for (const plan of plans) {
    if (options.signal?.aborted) {
      logger.warn(`[${plan.vendor}] Aborted before plan`);
      return fail(new CaptureAbortedError());
    }

    const result = await runPlan(transport, plan, tracker);

    if (!result.success) {
      if (result.error instanceof CaptureAbortedError) {
        return result;
      }
      logger.warn(`[${plan.vendor}] Plan failed: ${result.error.message}`);
      lastFailure = result;
      continue;
    }

    const size = result.data.bytes.length;
    if (size >= options.minImageBytes) {
      if (plans.length > 1) {
        logger.info(`[${plan.vendor}] Plan produced ${size} bytes`);
      }
      return result;
    }

    logger.warn(`[${plan.vendor}] Plan produced only ${size} bytes`);
    if (!best || size > best.bytes.length) {
      best = result.data;
    }
  }

  return best ? ok(best) : lastFailure;
}
