export type ValuationErrorKind = 'DataUnavailable' | 'DataInsufficient' | 'InvalidRateRelation';

export abstract class ValuationError extends Error {
  abstract readonly kind: ValuationErrorKind;
}

/** Ticker not found, provider unreachable, or statements empty/malformed. */
export class DataUnavailableError extends ValuationError {
  readonly kind = 'DataUnavailable' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataUnavailableError';
  }
}

/** A required field is still missing after the fetched data was cleaned. */
export class DataInsufficientError extends ValuationError {
  readonly kind = 'DataInsufficient' as const;

  constructor(message: string) {
    super(message);
    this.name = 'DataInsufficientError';
  }
}

/** Discount rate does not exceed terminal growth, so the Gordon terminal value is meaningless. */
export class InvalidRateRelationError extends ValuationError {
  readonly kind = 'InvalidRateRelation' as const;

  constructor(
    readonly discountRate: number,
    readonly terminalGrowthRate: number
  ) {
    super(
      `Discount rate ${(discountRate * 100).toFixed(2)}% must exceed terminal growth rate ${(terminalGrowthRate * 100).toFixed(2)}%`
    );
    this.name = 'InvalidRateRelationError';
  }
}

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: ValuationError };

export function succeed<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ValuationError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Runs a stage body and folds any ValuationError it throws into a failed result.
 * Anything else is a programming error and keeps propagating.
 */
export function runStage<T>(body: () => T): StageResult<T> {
  try {
    return succeed(body());
  } catch (error) {
    if (error instanceof ValuationError) {
      return fail(error);
    }
    throw error;
  }
}

/** Acquisition variant: any failure while fetching counts as the data being unavailable. */
export async function runFetchStage<T>(body: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return succeed(await body());
  } catch (error) {
    if (error instanceof ValuationError) {
      return fail(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return fail(new DataUnavailableError(message, { cause: error }));
  }
}
