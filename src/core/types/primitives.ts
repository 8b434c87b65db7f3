// Adapter-neutral primitive types used across the library.

export type Address = `0x${string}`;
export type Hex = `0x${string}`;
export type Hash = Hex;

// Helpers
export type UInt = bigint;
