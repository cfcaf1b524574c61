import { randomBytes } from "crypto";

/** Supplies raw entropy to token generation. */
export interface RandomSource {
  randomBytes(size: number): Uint8Array;
}

/** Process-wide CSPRNG from Node's crypto module. */
export const cryptoRandomSource: RandomSource = {
  randomBytes: (size) => randomBytes(size),
};
