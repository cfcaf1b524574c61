import type { RandomSource } from "../services/randomSource.js";

/** Call n fills every byte with n, so the first token is all zeros. */
export function createSequenceRandomSource(): RandomSource {
  let call = 0;
  return {
    randomBytes: (size) => new Uint8Array(size).fill(call++ & 0xff),
  };
}

export function createFixedRandomSource(byte: number): RandomSource {
  return {
    randomBytes: (size) => new Uint8Array(size).fill(byte),
  };
}

export function createFailingRandomSource(message: string): RandomSource {
  return {
    randomBytes: () => {
      throw new Error(message);
    },
  };
}

export function createShortRandomSource(): RandomSource {
  return {
    randomBytes: (size) => new Uint8Array(Math.max(0, size - 1)),
  };
}
