/**
 * Credential store: the stored address, node provider key and explorer key.
 * The only state that survives between invocations.
 */

import { mkdir, open, readFile, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

const CredentialFieldSchema = z.string().trim().min(1);

const CredentialsSchema = z.object({
  address: CredentialFieldSchema.optional(),
  nodeKey: CredentialFieldSchema.optional(),
  scanKey: CredentialFieldSchema.optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

const StoredFileSchema = z.record(z.unknown());

export type CredentialField = keyof Credentials;

export const CREDENTIAL_FIELDS: readonly CredentialField[] = ['address', 'nodeKey', 'scanKey'];

/** `string` sets a field, `null` removes it, absent leaves it untouched. */
export type CredentialsPatch = { [K in CredentialField]?: string | null };

export interface CredentialStore {
  /** Where the credentials live, for display. */
  readonly location: string;
  /** Current credentials. Never fails: missing or unreadable storage reads as empty. */
  get(): Promise<Credentials>;
  /** Merge the patch into the stored value, persist, and return the full new state. */
  set(patch: CredentialsPatch): Promise<Credentials>;
}

/**
 * Apply a patch to a credentials value without mutating either.
 */
export function mergeCredentials(current: Credentials, patch: CredentialsPatch): Credentials {
  const next: Credentials = { ...current };
  for (const field of CREDENTIAL_FIELDS) {
    const value = patch[field];
    if (value === undefined) continue;
    if (value === null) {
      delete next[field];
    } else {
      next[field] = value;
    }
  }
  return next;
}

export function isEmptyPatch(patch: CredentialsPatch): boolean {
  return CREDENTIAL_FIELDS.every((field) => patch[field] === undefined);
}

// =============================================================================
// File-backed store
// =============================================================================

/**
 * JSON file store. Writes go to a temp file first and are renamed into place,
 * so a failed write never leaves a truncated credentials file behind.
 */
export class FileCredentialStore implements CredentialStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async get(): Promise<Credentials> {
    let raw: string;
    try {
      raw = await readFile(this.location, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) return {};
      console.warn(`Could not read credentials at ${this.location}: ${describe(error)}`);
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`Ignoring malformed credentials file ${this.location}: ${describe(error)}`);
      return {};
    }

    const stored = StoredFileSchema.safeParse(json);
    if (!stored.success) {
      console.warn(`Ignoring credentials file ${this.location} with unexpected contents`);
      return {};
    }

    // One bad field does not cost the others
    const credentials: Credentials = {};
    for (const field of CREDENTIAL_FIELDS) {
      if (stored.data[field] === undefined) continue;
      const value = CredentialFieldSchema.safeParse(stored.data[field]);
      if (value.success) {
        credentials[field] = value.data;
      } else {
        console.warn(`Ignoring invalid ${field} in credentials file ${this.location}`);
      }
    }
    return credentials;
  }

  async set(patch: CredentialsPatch): Promise<Credentials> {
    const current = await this.get();
    if (isEmptyPatch(patch)) return current;

    const next = mergeCredentials(current, patch);
    await this.write(next);
    return next;
  }

  private async write(credentials: Credentials): Promise<void> {
    await mkdir(dirname(this.location), { recursive: true, mode: 0o700 });

    const tempPath = `${this.location}.${process.pid}.tmp`;
    // Only a temp file this call created is cleaned up
    let created = false;
    try {
      const handle = await open(tempPath, 'w', 0o600);
      created = true;
      try {
        await handle.writeFile(`${JSON.stringify(credentials, null, 2)}\n`, 'utf8');
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.location);
    } catch (error) {
      if (created) await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
