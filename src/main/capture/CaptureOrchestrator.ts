import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { CaptureState, VendorTag } from '@shared/types/capture.types';
import type {
  AttemptRecord,
  Candidate,
  CaptureRequest,
  CaptureTarget,
  ColorMode,
  ImageBlob,
  InstrumentIdentity,
} from '@shared/types/capture.types';
import { CAPTURE, SETTLE_DELAYS } from '@shared/constants';
import type { InstrumentTransport, TransportOpener } from '../transport/types';
import { isNetworkResource } from '../visa/resourceAddress';
import {
  CaptureAbortedError,
  CaptureError,
  CaptureFailedError,
  InsufficientDataError,
  QueryError,
  getErrorCode,
  getErrorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { coerceColorMode } from './colorMode';
import { candidateKey, vicpDowngradeFor } from './ConnectionResolver';
import { finalizeImage } from './ImageFinalizer';
import { commandsFor, runPlans } from './VendorDispatcher';
import { toIdentity } from './vendorDetection';
import { attemptStep } from './types';
import type { CaptureOptions, CaptureResult } from './types';
import { timestampedPath } from '../storage/ImageStorage';

export interface CandidateSource {
  candidatesFor(target: CaptureTarget): Promise<Candidate[]>;
}

export interface ImageSink {
  /** Writes the image and returns the path actually used */
  persist(blob: ImageBlob, resolvedPath: string): Promise<string>;
}

export interface CaptureDependencies {
  opener: TransportOpener;
  resolver: CandidateSource;
  storage: ImageSink;
  now?: () => Date;
  createId?: () => string;
}

export interface StateChange {
  captureId: string;
  previous: CaptureState;
  state: CaptureState;
  /** Candidate being attempted, absent for the terminal states */
  candidate?: Candidate;
}

/** States at which a LeCroy session failure earns a retry over raw VICP */
const DOWNGRADE_STATES: ReadonlySet<CaptureState> = new Set([
  CaptureState.CONFIGURING,
  CaptureState.TRIGGERED,
  CaptureState.RECEIVING,
  CaptureState.VALIDATING,
]);

interface AttemptContext {
  captureId: string;
  colorMode: ColorMode;
  timeoutMs: number;
  signal?: AbortSignal;
}

type AttemptOutcome =
  | { success: true; blob: ImageBlob; identity: InstrumentIdentity; record: AttemptRecord }
  | { success: false; error: CaptureError; record: AttemptRecord };

/**
 * Drives one capture: walks the candidates for a target, identifies the
 * instrument on each, runs the vendor plan and validates what comes back.
 * Never throws for instrument trouble; every outcome is a CaptureResult.
 *
 * Emits `state-changed` with a StateChange on every transition.
 */
export class CaptureOrchestrator extends EventEmitter {
  private state: CaptureState = CaptureState.IDLE;
  private readonly options: CaptureOptions;
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(
    private readonly deps: CaptureDependencies,
    options: Partial<CaptureOptions> = {}
  ) {
    super();
    this.options = {
      minImageBytes: options.minImageBytes ?? CAPTURE.MIN_IMAGE_BYTES,
      delays: options.delays ?? SETTLE_DELAYS,
    };
    this.now = deps.now ?? (() => new Date());
    this.createId = deps.createId ?? (() => uuidv4());
  }

  getState(): CaptureState {
    return this.state;
  }

  async capture(request: CaptureRequest, signal?: AbortSignal): Promise<CaptureResult> {
    const captureId = this.createId();
    const attempts: AttemptRecord[] = [];
    const warnings: string[] = [];
    this.state = CaptureState.IDLE;

    const color = coerceColorMode(request.colorMode);
    if (color.warning) {
      logger.warn(`[Capture] ${color.warning}`);
      warnings.push(color.warning);
    }

    const failed = (failure: CaptureFailedError | CaptureAbortedError): CaptureResult => {
      if (!(failure instanceof CaptureAbortedError)) {
        this.transition(captureId, CaptureState.FAILED);
      }
      logger.error(`[Capture] ${captureId} failed: ${failure.message}`);
      return { success: false, captureId, failure, attempts, warnings };
    };

    if (signal?.aborted) {
      return failed(new CaptureAbortedError());
    }

    const resolved = await attemptStep(() => this.deps.resolver.candidatesFor(request.target));
    if (!resolved.success) {
      return failed(new CaptureFailedError('Could not resolve capture target', 0, resolved.error));
    }
    if (resolved.data.length === 0) {
      return failed(new CaptureFailedError('No instrument found for capture target', 0));
    }

    const context: AttemptContext = {
      captureId,
      colorMode: color.mode,
      timeoutMs: request.timeoutSeconds * 1000,
      signal,
    };
    const queue = [...resolved.data];
    const attempted = new Set<string>();
    let downgradeUsed = false;
    let forcedKey: string | null = null;
    let lastError: CaptureError | null = null;

    while (queue.length > 0) {
      const candidate = queue.shift();
      if (!candidate) break;

      const key = candidateKey(candidate);
      attempted.add(key);
      logger.info(`[Capture] Trying ${key} (${attempts.length + 1})`);

      const outcome = await this.attempt(candidate, context);
      if (key === forcedKey) {
        outcome.record.downgrade = true;
      }
      attempts.push(outcome.record);

      if (outcome.success) {
        return this.complete(request, context, outcome, attempts, warnings, failed);
      }

      if (outcome.error instanceof CaptureAbortedError) {
        return failed(outcome.error);
      }

      lastError = outcome.error;
      logger.warn(`[Capture] ${key} failed at ${outcome.record.reached}: ${outcome.error.message}`);

      if (!downgradeUsed && this.qualifiesForDowngrade(candidate, outcome.record)) {
        const fallback = vicpDowngradeFor(candidate);
        const fallbackKey = fallback ? candidateKey(fallback) : null;
        if (fallback && fallbackKey && !attempted.has(fallbackKey)) {
          downgradeUsed = true;
          forcedKey = fallbackKey;
          const remaining = queue.filter((queued) => candidateKey(queued) !== fallbackKey);
          queue.splice(0, queue.length, fallback, ...remaining);
          logger.info(`[Capture] LeCroy image incomplete, forcing VICP on ${fallbackKey}`);
        }
      }

      if (queue.length > 0) {
        if (!this.transition(captureId, CaptureState.RETRY, undefined, signal)) {
          return failed(new CaptureAbortedError());
        }
      }
    }

    return failed(new CaptureFailedError(
      `No candidate produced an image (${attempts.length} attempted)`,
      attempts.length,
      lastError
    ));
  }

  private qualifiesForDowngrade(candidate: Candidate, record: AttemptRecord): boolean {
    return (
      record.identity?.vendor === VendorTag.LECROY &&
      candidate.kind === 'resource' &&
      isNetworkResource(candidate.address) &&
      DOWNGRADE_STATES.has(record.reached)
    );
  }

  // ─── Single candidate ───────────────────────────────────────────

  private async attempt(candidate: Candidate, context: AttemptContext): Promise<AttemptOutcome> {
    const record: AttemptRecord = { candidate, reached: CaptureState.CONNECTING, bytesReceived: 0 };
    const failWith = (error: CaptureError): AttemptOutcome => {
      record.errorCode = getErrorCode(error);
      record.error = error.message;
      return { success: false, error, record };
    };

    if (!this.transition(context.captureId, CaptureState.CONNECTING, candidate, context.signal)) {
      return failWith(new CaptureAbortedError());
    }

    const opened = await attemptStep(() => this.deps.opener.open(candidate, context.timeoutMs));
    if (!opened.success) {
      return failWith(opened.error);
    }

    const transport = opened.data;
    try {
      const enter = (state: CaptureState): boolean => {
        if (!this.transition(context.captureId, state, candidate, context.signal)) {
          return false;
        }
        record.reached = state;
        return true;
      };

      if (!enter(CaptureState.IDENTIFYING)) {
        return failWith(new CaptureAbortedError());
      }
      const identity = await this.identify(transport);
      record.identity = identity;

      if (
        candidate.kind === 'raw-socket' &&
        candidate.expectVendor !== undefined &&
        identity.vendor !== candidate.expectVendor
      ) {
        return failWith(new QueryError(
          `${transport.label} identified as ${identity.vendor}, expected ${candidate.expectVendor}`
        ));
      }

      const plans = commandsFor(identity.vendor, context.colorMode, transport.kind, this.options.delays);
      const received = await runPlans(transport, plans, {
        minImageBytes: this.options.minImageBytes,
        onState: enter,
        signal: context.signal,
      });
      if (!received.success) {
        return failWith(received.error);
      }

      record.bytesReceived = received.data.bytes.length;
      if (!enter(CaptureState.VALIDATING)) {
        return failWith(new CaptureAbortedError());
      }
      if (record.bytesReceived < this.options.minImageBytes) {
        return failWith(new InsufficientDataError(record.bytesReceived, this.options.minImageBytes));
      }

      return { success: true, blob: received.data, identity, record };
    } finally {
      await this.closeTransport(transport);
    }
  }

  /** Identity of the open instrument; UNKNOWN when it does not answer */
  private async identify(transport: InstrumentTransport): Promise<InstrumentIdentity> {
    const answer = await attemptStep(() => transport.identify());
    if (!answer.success || answer.data === '') {
      const reason = answer.success ? 'empty response' : answer.error.message;
      logger.warn(`[Capture] *IDN? on ${transport.label} gave nothing usable (${reason}), vendor UNKNOWN`);
      return { raw: '', vendor: VendorTag.UNKNOWN };
    }

    const identity = toIdentity(answer.data);
    logger.info(`[Capture] ${transport.label}: ${identity.raw} -> ${identity.vendor}`);
    return identity;
  }

  private async closeTransport(transport: InstrumentTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      logger.warn(`[Capture] Error closing ${transport.label}: ${getErrorMessage(error)}`);
    }
  }

  // ─── Completion ─────────────────────────────────────────────────

  private async complete(
    request: CaptureRequest,
    context: AttemptContext,
    outcome: Extract<AttemptOutcome, { success: true }>,
    attempts: AttemptRecord[],
    warnings: string[],
    failed: (failure: CaptureFailedError | CaptureAbortedError) => CaptureResult
  ): Promise<CaptureResult> {
    const image: ImageBlob = { bytes: finalizeImage(outcome.blob), envelope: 'none' };
    const target = timestampedPath(request.outputPathTemplate, this.now());

    const saved = await attemptStep(() => this.deps.storage.persist(image, target));
    if (!saved.success) {
      return failed(new CaptureFailedError('Image received but could not be saved', attempts.length, saved.error));
    }

    this.transition(context.captureId, CaptureState.DONE);
    logger.info(`[Capture] ${context.captureId} done: ${saved.data} (${image.bytes.length} bytes)`);
    return {
      success: true,
      captureId: context.captureId,
      path: saved.data,
      bytes: image.bytes.length,
      identity: outcome.identity,
      candidate: outcome.record.candidate,
      attempts,
      warnings,
    };
  }

  /**
   * Move to `state` unless the signal has fired. Returns false on abort,
   * leaving the current state unchanged.
   */
  private transition(
    captureId: string,
    state: CaptureState,
    candidate?: Candidate,
    signal?: AbortSignal
  ): boolean {
    if (signal?.aborted) {
      logger.warn(`[Capture] Aborted before ${state}`);
      return false;
    }

    const previous = this.state;
    this.state = state;
    logger.debug(`[Capture] ${previous} -> ${state}`);
    const change: StateChange = { captureId, previous, state, candidate };
    this.emit('state-changed', change);
    return true;
  }
}
