/** The job produced its result. `outputRef` points at where the output lives (a path, a URL, a key). */
export interface SuccessOutcome {
  readonly kind: 'success';
  readonly outputRef?: string;
  /** Named output pointers, kept on the registry record. */
  readonly outputs?: Readonly<Record<string, string>>;
}

/** The job failed for this item only. The batch continues. */
export interface FailureOutcome {
  readonly kind: 'failure';
  readonly error: string;
}

/** The job hit a condition that makes every further item pointless (revoked credentials, exhausted quota). */
export interface FatalOutcome {
  readonly kind: 'fatal';
  readonly error: string;
}

/** Result of one job invocation. */
export type JobOutcome = SuccessOutcome | FailureOutcome | FatalOutcome;

export function success(outputRef?: string, outputs?: Readonly<Record<string, string>>): SuccessOutcome {
  const outcome: { kind: 'success'; outputRef?: string; outputs?: Readonly<Record<string, string>> } = {
    kind: 'success',
  };
  if (outputRef !== undefined) outcome.outputRef = outputRef;
  if (outputs !== undefined) outcome.outputs = outputs;
  return outcome;
}

export function failure(error: string): FailureOutcome {
  return { kind: 'failure', error };
}

export function fatal(error: string): FatalOutcome {
  return { kind: 'fatal', error };
}

export function isFatal(outcome: JobOutcome): outcome is FatalOutcome {
  return outcome.kind === 'fatal';
}
