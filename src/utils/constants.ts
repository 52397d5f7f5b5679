// Initial table shape
export const DEFAULT_BUCKET_COUNT = 32;
export const MIN_BUCKET_COUNT = 2;
export const MAX_INITIAL_BITS = 30;

// Addressing hash: h = h * 31 + byte, 32-bit unsigned wraparound
export const HASH_MULTIPLIER = 31;
export const HASH_WIDTH = 32;

// Highest address width a 32-bit hash can feed without running out of bits
export const MAX_BITS = HASH_WIDTH - 1;

// U+FFFD, hashed in place of unpaired surrogates
export const REPLACEMENT_CHAR = 0xfffd;

export const LOGGER_NAME = "linear-hash";
