/**
 * rotary-scrollbar - Config Checks
 * Construction-time assertions shared by the component factories
 */

/** Throw unless `value` is left out or a finite number >= 0 */
export const assertNonNegative = (
  key: string,
  value: number | undefined,
): void => {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`[rotary-scrollbar] ${key} must be a non-negative number`);
  }
};

/** Throw unless `value` is left out or a finite number > 0 */
export const assertPositive = (
  key: string,
  value: number | undefined,
): void => {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`[rotary-scrollbar] ${key} must be a positive number`);
  }
};

/** Throw unless `value` is left out or a function */
export const assertCurve = (key: string, value: unknown): void => {
  if (value !== undefined && typeof value !== "function") {
    throw new Error(`[rotary-scrollbar] ${key} must be a function`);
  }
};
