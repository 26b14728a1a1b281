import path from "node:path";
import {
  IOError,
  IntegrityError,
  type StageName,
} from "../errors/index.js";
import { computeDigest, type Digest } from "./digest.js";
import type { Result, VerificationResult } from "./types.js";

export interface VerifySourceInput {
  readonly archivePath: string;
  readonly expected: Digest;
  readonly stage?: StageName | null;
}

/**
 * Compare an archive on disk against its expected digest. Reads only; the
 * archive is never modified or removed on failure.
 */
export async function verifySource(
  input: VerifySourceInput,
): Promise<Result<VerificationResult, IntegrityError | IOError>> {
  const archivePath = path.resolve(input.archivePath);
  const stage = input.stage ?? null;

  let actual: Digest;
  try {
    actual = await computeDigest(archivePath, input.expected.algorithm);
  } catch (error) {
    if (error instanceof IOError) {
      return {
        ok: false,
        error: new IOError({
          path: error.path,
          code: error.code,
          message: error.message,
          stage,
          cause: error.cause,
        }),
      };
    }
    throw error;
  }

  const result: VerificationResult = {
    archivePath,
    algorithm: input.expected.algorithm,
    expected: input.expected.hex,
    actual: actual.hex,
    matches: actual.equals(input.expected),
  };

  if (!result.matches) {
    return {
      ok: false,
      error: new IntegrityError({
        archivePath,
        expected: result.expected,
        actual: result.actual,
        stage,
      }),
    };
  }

  return { ok: true, value: result };
}

export async function assertSourceIntegrity(
  input: VerifySourceInput,
): Promise<VerificationResult> {
  const result = await verifySource(input);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
