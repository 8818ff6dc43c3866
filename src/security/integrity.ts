/**
 * Startup integrity check: SHA-256 of each file listed in a JSON manifest
 * `{ "files": { "<path relative to the manifest>": "<hex sha256>" } }`.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { createHash } from "crypto";
import { z } from "zod";
import type { IntegrityVerifier } from "../pipeline/types";
import { errorMessage, logger } from "../logging";

const manifestSchema = z.object({
  files: z.record(z.string().min(1), z.string().regex(/^[0-9a-fA-F]{64}$/, "expected a hex sha256")),
});

export type IntegrityManifest = z.infer<typeof manifestSchema>;

export interface IntegrityMismatch {
  file: string;
  reason: "missing" | "hash_mismatch";
}

export async function sha256File(filePath: string): Promise<string> {
  const data = await fs.readFile(filePath);
  return createHash("sha256").update(data).digest("hex");
}

export class ManifestIntegrityVerifier implements IntegrityVerifier {
  private manifest: IntegrityManifest | null = null;
  private lastMismatches: IntegrityMismatch[] = [];

  /** No manifest path means there is nothing to verify. */
  constructor(private readonly manifestPath?: string) {}

  /** Loads the manifest; a malformed or unreadable manifest rejects. */
  async start(): Promise<void> {
    if (!this.manifestPath) {
      this.manifest = null;
      return;
    }
    const raw = await fs.readFile(this.manifestPath, "utf8");
    const parsed = manifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`integrity manifest ${this.manifestPath} is malformed: ${parsed.error.message}`);
    }
    this.manifest = parsed.data;
  }

  async stop(): Promise<void> {
    this.manifest = null;
  }

  async verifySystemIntegrity(): Promise<boolean> {
    if (!this.manifestPath) {
      logger.warn({ event: "INTEGRITY_SKIPPED" }, "No integrity manifest configured; skipping verification");
      return true;
    }
    if (!this.manifest) throw new Error("integrity verifier not started");

    const base = path.dirname(path.resolve(this.manifestPath));
    const mismatches: IntegrityMismatch[] = [];
    for (const [file, expected] of Object.entries(this.manifest.files)) {
      try {
        const actual = await sha256File(path.resolve(base, file));
        if (actual !== expected.toLowerCase()) mismatches.push({ file, reason: "hash_mismatch" });
      } catch (err) {
        logger.debug({ event: "INTEGRITY_READ_FAILED", file, err: errorMessage(err) }, "Could not read file");
        mismatches.push({ file, reason: "missing" });
      }
    }
    this.lastMismatches = mismatches;
    if (mismatches.length > 0) {
      logger.error({ event: "INTEGRITY_MISMATCH", mismatches }, "Integrity verification failed");
      return false;
    }
    logger.info({ event: "INTEGRITY_VERIFIED", files: Object.keys(this.manifest.files).length }, "Integrity verified");
    return true;
  }

  getMismatches(): IntegrityMismatch[] {
    return [...this.lastMismatches];
  }
}
