/**
 * Credential store: the one API token, kept in the OS secret store.
 *
 * Every operation returns an outcome instead of throwing: a keychain that is
 * missing, locked or denies access must never stop the dashboard from
 * starting. Callers fall back to a session-only token on `save` failure.
 */

import { debug } from "../log.ts";
import { err, ok, type Result } from "../types/result.ts";

export const KEYRING_SERVICE = "asana-progress";
export const KEYRING_ACCOUNT = "api_key";
/** Service the `asana_cli` tracker stored the same token under. */
export const LEGACY_KEYRING_SERVICE = "asana_cli";

export type EntryName = {
  readonly service: string;
  readonly account: string;
};

export type StoreErrorKind = "unavailable" | "denied";

export type StoreError = {
  readonly kind: StoreErrorKind;
  readonly message: string;
};

/** Narrow surface over a platform secret store. */
export type SecretBackend = {
  getPassword(service: string, account: string): Promise<string | undefined>;
  setPassword(service: string, account: string, secret: string): Promise<void>;
  /** Resolves false when there was nothing to delete. */
  deletePassword(service: string, account: string): Promise<boolean>;
};

export type CredentialStore = {
  save(token: string): Promise<Result<void, StoreError>>;
  load(): Promise<string | undefined>;
  clear(): Promise<Result<void, StoreError>>;
};

// ── Backends ─────────────────────────────────────────────────────────

/**
 * Backend on the native keychain (macOS Keychain, Windows Credential Manager,
 * Secret Service on Linux). The native module is loaded on first use so a
 * platform without a prebuilt binary only fails the calls, not the import.
 */
export function createKeyringBackend(): SecretBackend {
  async function entry(service: string, account: string) {
    const { Entry } = await import("@napi-rs/keyring");
    return new Entry(service, account);
  }

  return {
    async getPassword(service, account) {
      const value: unknown = (await entry(service, account)).getPassword();
      return typeof value === "string" && value.length > 0 ? value : undefined;
    },
    async setPassword(service, account, secret) {
      (await entry(service, account)).setPassword(secret);
    },
    async deletePassword(service, account) {
      const removed: unknown = (await entry(service, account)).deletePassword();
      return removed !== false;
    },
  };
}

/** In-process backend. Nothing survives the process. */
export function createMemoryBackend(initial: Readonly<Record<string, string>> = {}): SecretBackend {
  const secrets = new Map<string, string>(Object.entries(initial));
  const key = (service: string, account: string) => `${service}/${account}`;

  return {
    async getPassword(service, account) {
      return secrets.get(key(service, account));
    },
    async setPassword(service, account, secret) {
      secrets.set(key(service, account), secret);
    },
    async deletePassword(service, account) {
      return secrets.delete(key(service, account));
    },
  };
}

// ── Error classification ─────────────────────────────────────────────

const DENIED = /denied|not allowed|permission|user (canceled|cancelled)|interaction/i;
const NO_ENTRY = /no (matching )?entry|not found|could not be found/i;

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toStoreError(error: unknown): StoreError {
  const message = messageOf(error);
  return { kind: DENIED.test(message) ? "denied" : "unavailable", message };
}

// ── Store ────────────────────────────────────────────────────────────

/**
 * `legacy` is read when `names` holds nothing, and removed by `clear` along
 * with it; pass null to skip it. New tokens are only ever written to `names`.
 */
export function createCredentialStore(
  backend: SecretBackend = createKeyringBackend(),
  names: EntryName = { service: KEYRING_SERVICE, account: KEYRING_ACCOUNT },
  legacy: EntryName | null = { service: LEGACY_KEYRING_SERVICE, account: KEYRING_ACCOUNT },
): CredentialStore {
  async function read(entry: EntryName): Promise<string | undefined> {
    const value = await backend.getPassword(entry.service, entry.account);
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  }

  async function remove(entry: EntryName): Promise<Result<void, StoreError>> {
    try {
      await backend.deletePassword(entry.service, entry.account);
      return ok(undefined);
    } catch (error) {
      // Clearing an absent token is not an error.
      if (NO_ENTRY.test(messageOf(error))) return ok(undefined);
      return err(toStoreError(error));
    }
  }

  return {
    async save(token) {
      try {
        await backend.setPassword(names.service, names.account, token);
        return ok(undefined);
      } catch (error) {
        return err(toStoreError(error));
      }
    },

    async load() {
      try {
        const current = await read(names);
        if (current !== undefined || !legacy) return current;
        const found = await read(legacy);
        if (found !== undefined) debug(`using the token stored under keyring service "${legacy.service}"`);
        return found;
      } catch (error) {
        debug("secret store read failed:", messageOf(error));
        return undefined;
      }
    },

    async clear() {
      const cleared = await remove(names);
      if (!cleared.ok || !legacy) return cleared;
      return remove(legacy);
    },
  };
}
