import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { CredentialRecordSchema, type CredentialRecord } from "@meeting-minutes/types";
import { StorageError, describeError } from "../errors.js";

/** Treat tokens this close to expiry as already expired */
export const TOKEN_SKEW_MS = 60_000;

/**
 * Persistence for the single cached OAuth credential.
 */
export interface CredentialStore {
  load(): Promise<CredentialRecord | null>;
  save(record: CredentialRecord): Promise<void>;
  clear(): Promise<void>;
}

export function isCredentialValid(
  record: CredentialRecord | null | undefined,
  now: number = Date.now()
): record is CredentialRecord {
  return !!record && record.expiresAt - TOKEN_SKEW_MS > now;
}

export function isCredentialRefreshable(record: CredentialRecord | null | undefined): boolean {
  return !!record?.refreshToken;
}

/**
 * File-backed credential store.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * reader never sees a half-written record. There is no locking: two
 * processes saving at once end with whichever rename lands last.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<CredentialRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch {
      return null;
    }

    try {
      const parsed = CredentialRecordSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      // Unparseable file counts as "not authorized"
      return null;
    }
  }

  async save(record: CredentialRecord): Promise<void> {
    const validated = CredentialRecordSchema.parse(record);
    const tmpPath = `${this.filePath}.${randomBytes(6).toString("hex")}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(validated, null, 2), { mode: 0o600 });
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new StorageError(`Could not save credentials: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new StorageError(`Could not remove credentials: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
