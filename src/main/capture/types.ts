import type {
  AttemptRecord,
  Candidate,
  InstrumentIdentity,
} from '@shared/types/capture.types';
import type { SettleDelays } from '@shared/constants';
import { CaptureError, getErrorMessage, isCaptureError } from '../utils/errors';
import type { CaptureAbortedError, CaptureFailedError } from '../utils/errors';

/** Outcome of one transport interaction */
export type StepResult<T> =
  | { success: true; data: T }
  | { success: false; error: CaptureError };

export function ok<T>(data: T): StepResult<T> {
  return { success: true, data };
}

export function fail<T>(error: CaptureError): StepResult<T> {
  return { success: false, error };
}

/**
 * Run a transport operation and fold whatever it throws into a failed step.
 * Errors outside the capture hierarchy keep their message and ride along
 * as `details`.
 */
export async function attemptStep<T>(operation: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (isCaptureError(error)) {
      return fail(error);
    }
    return fail(new CaptureError(getErrorMessage(error), 'UNEXPECTED_ERROR', error));
  }
}

export type CaptureResult = CaptureSuccess | CaptureFailure;

export interface CaptureSuccess {
  success: true;
  captureId: string;
  /** Where the image was written */
  path: string;
  bytes: number;
  identity: InstrumentIdentity;
  candidate: Candidate;
  attempts: AttemptRecord[];
  warnings: string[];
}

export interface CaptureFailure {
  success: false;
  captureId: string;
  failure: CaptureFailedError | CaptureAbortedError;
  attempts: AttemptRecord[];
  warnings: string[];
}

export interface CaptureOptions {
  /** Smallest byte count accepted as an image */
  minImageBytes: number;
  delays: SettleDelays;
}
