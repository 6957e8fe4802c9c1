import type { CredentialStore } from "./credential-store.ts";

export const ENV_KEYS: readonly string[] = [
  "ASANA_ACCESS_TOKEN",
  "ASANA_TOKEN",
  "ASANA_PAT",
] as const;

export type TokenSource = "env" | "keychain" | "session";

export interface ResolvedToken {
  readonly token: string;
  readonly source: TokenSource;
  /** Which variable supplied the token, when `source` is "env". */
  readonly envKey?: string;
}

export function normalizeToken(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readTokenFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedToken | undefined {
  for (const key of ENV_KEYS) {
    const value = env[key];
    const normalized = value !== undefined ? normalizeToken(value) : undefined;
    if (normalized !== undefined) {
      return { token: normalized, source: "env", envKey: key };
    }
  }
  return undefined;
}

/**
 * Environment variables win over the stored credential, which is read once
 * per call. Resolves undefined when neither has a token.
 */
export async function resolveToken(
  store: CredentialStore,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedToken | undefined> {
  const fromEnv = readTokenFromEnv(env);
  if (fromEnv !== undefined) {
    return fromEnv;
  }

  const stored = await store.load();
  return stored !== undefined ? { token: stored, source: "keychain" } : undefined;
}

/** Shows only the last four characters: `••••abcd`. */
export function maskToken(token: string): string {
  const tail = token.length > 8 ? token.slice(-4) : "";
  return `••••${tail}`;
}
