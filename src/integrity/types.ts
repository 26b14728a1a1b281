export type DigestAlgorithm = "sha256" | "sha512";

export const DIGEST_HEX_LENGTH: Readonly<Record<DigestAlgorithm, number>> = {
  sha256: 64,
  sha512: 128,
};

export interface VerificationResult {
  readonly archivePath: string;
  readonly algorithm: DigestAlgorithm;
  readonly expected: string;
  readonly actual: string;
  readonly matches: boolean;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
