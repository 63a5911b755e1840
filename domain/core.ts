/**
 * Domain core: branded scalar primitives.
 * Framework-independent. No calendar logic.
 */

// --- Branded scalars ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Point in time: whole seconds since 1970-01-01T00:00:00Z held as an unsigned
 * 32-bit integer. 0 means "unset". Overflows at 2106-02-07T06:28:16Z.
 */
export type Timestamp = Brand<number, "TimestampSeconds">;

/** Largest value of the unsigned 32-bit representation. */
export const UINT32_MAX = 0xffff_ffff;

// --- Constructors (no validation) ---

/**
 * Narrow any integer to the unsigned 32-bit representation, wrapping modulo 2^32.
 * Fractions are dropped.
 */
export const asTimestamp = (seconds: number) => (seconds >>> 0) as Timestamp;
