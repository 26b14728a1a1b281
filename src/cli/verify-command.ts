import { RecipeError } from "../errors/index.js";
import {
  assertSourceIntegrity,
  parseDigest,
  type DigestAlgorithm,
  type VerificationResult,
} from "../integrity/index.js";

export interface VerifyOptions {
  readonly archive: string;
  readonly sha256?: string;
  readonly sha512?: string;
}

export async function runVerifyCommand(
  options: VerifyOptions,
): Promise<VerificationResult> {
  const { algorithm, value } = pickDigest(options);
  const parsed = parseDigest(algorithm, value);
  if (!parsed.ok) {
    throw new RecipeError(`--${algorithm}`, [parsed.error.message]);
  }
  return await assertSourceIntegrity({
    archivePath: options.archive,
    expected: parsed.value,
  });
}

function pickDigest(options: VerifyOptions): {
  algorithm: DigestAlgorithm;
  value: string;
} {
  if (options.sha256 !== undefined && options.sha512 !== undefined) {
    throw new RecipeError("verify options", [
      "pass only one of --sha256 or --sha512",
    ]);
  }
  if (options.sha256 !== undefined) {
    return { algorithm: "sha256", value: options.sha256 };
  }
  if (options.sha512 !== undefined) {
    return { algorithm: "sha512", value: options.sha512 };
  }
  throw new RecipeError("verify options", [
    "an expected digest is required (--sha256 or --sha512)",
  ]);
}
