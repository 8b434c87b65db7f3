export const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x);

export const isBigint = (x: unknown): x is bigint => typeof x === 'bigint';

/** 2^64 - 1 */
export const MAX_UINT64 = (1n << 64n) - 1n;

/** 2^256 - 1 */
export const MAX_UINT256 = (1n << 256n) - 1n;

export const isUint64 = (x: unknown): x is bigint => isBigint(x) && x >= 0n && x <= MAX_UINT64;
