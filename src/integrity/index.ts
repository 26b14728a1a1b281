export { Digest, computeDigest, parseDigest } from "./digest.js";
export { assertSourceIntegrity, verifySource } from "./gate.js";
export { DIGEST_HEX_LENGTH } from "./types.js";
export type { DigestAlgorithm, Result, VerificationResult } from "./types.js";
