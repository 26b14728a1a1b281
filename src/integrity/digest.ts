import crypto from "node:crypto";
import fs from "node:fs/promises";
import { toIOError } from "../errors/index.js";
import {
  DIGEST_HEX_LENGTH,
  type DigestAlgorithm,
  type Result,
} from "./types.js";

const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * Lowercase hex digest of a fixed algorithm. Instances only come from
 * `parseDigest` or `computeDigest`, so the hex form always has the exact
 * length the algorithm produces.
 */
export class Digest {
  private constructor(
    readonly algorithm: DigestAlgorithm,
    readonly hex: string,
  ) {}

  static parse(algorithm: DigestAlgorithm, value: string): Result<Digest> {
    const normalized = value.trim().toLowerCase();
    const expectedLength = DIGEST_HEX_LENGTH[algorithm];
    if (!HEX_PATTERN.test(normalized)) {
      return {
        ok: false,
        error: new Error(`${algorithm} digest must be hexadecimal`),
      };
    }
    if (normalized.length !== expectedLength) {
      return {
        ok: false,
        error: new Error(
          `${algorithm} digest must be ${expectedLength} hex characters (got ${normalized.length})`,
        ),
      };
    }
    return { ok: true, value: new Digest(algorithm, normalized) };
  }

  static fromBytes(algorithm: DigestAlgorithm, data: Uint8Array): Digest {
    const hash = crypto.createHash(algorithm);
    hash.update(data);
    return new Digest(algorithm, hash.digest("hex"));
  }

  equals(other: Digest): boolean {
    return this.algorithm === other.algorithm && this.hex === other.hex;
  }

  toString(): string {
    return `${this.algorithm}:${this.hex}`;
  }
}

export function parseDigest(
  algorithm: DigestAlgorithm,
  value: string,
): Result<Digest> {
  return Digest.parse(algorithm, value);
}

export async function computeDigest(
  filePath: string,
  algorithm: DigestAlgorithm,
): Promise<Digest> {
  let data: Buffer;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      const error = Object.assign(new Error("not a file"), {
        code: stats.isDirectory() ? "EISDIR" : "EINVAL",
      });
      throw error;
    }
    data = await fs.readFile(filePath);
  } catch (error) {
    throw toIOError(error, filePath);
  }
  return Digest.fromBytes(algorithm, data);
}
