import { describe, expect, it } from "vitest";
import {
  createCredentialStore,
  createMemoryBackend,
  KEYRING_ACCOUNT,
  KEYRING_SERVICE,
  LEGACY_KEYRING_SERVICE,
  toStoreError,
  type SecretBackend,
} from "../auth/credential-store.ts";

function failingBackend(message: string): SecretBackend {
  return {
    getPassword: () => Promise.reject(new Error(message)),
    setPassword: () => Promise.reject(new Error(message)),
    deletePassword: () => Promise.reject(new Error(message)),
  };
}

describe("createCredentialStore", () => {
  it("load on an empty store returns undefined", async () => {
    const store = createCredentialStore(createMemoryBackend());
    expect(await store.load()).toBeUndefined();
  });

  it("two saves keep only the latest token", async () => {
    const store = createCredentialStore(createMemoryBackend());
    expect(await store.save("first-token")).toEqual({ ok: true, value: undefined });
    await store.save("second-token");
    expect(await store.load()).toBe("second-token");
  });

  it("stores under the asana-progress service and api_key account", async () => {
    const backend = createMemoryBackend();
    await createCredentialStore(backend).save("test-secret");
    expect(await backend.getPassword(KEYRING_SERVICE, KEYRING_ACCOUNT)).toBe("test-secret");
  });

  it("treats a whitespace-only stored value as absent", async () => {
    const store = createCredentialStore(createMemoryBackend({ "asana-progress/api_key": "   " }));
    expect(await store.load()).toBeUndefined();
  });

  it("clear is idempotent", async () => {
    const store = createCredentialStore(createMemoryBackend());
    await store.save("test-secret");
    expect((await store.clear()).ok).toBe(true);
    expect((await store.clear()).ok).toBe(true);
    expect(await store.load()).toBeUndefined();
  });

  it("falls back to the asana_cli entry when the current one is empty", async () => {
    const backend = createMemoryBackend({ "asana_cli/api_key": " test-secret-old " });
    const store = createCredentialStore(backend);

    expect(await store.load()).toBe("test-secret-old");

    await store.save("test-secret-new");
    expect(await store.load()).toBe("test-secret-new");
    expect(await backend.getPassword(LEGACY_KEYRING_SERVICE, KEYRING_ACCOUNT)).toBe(" test-secret-old ");
  });

  it("clear removes the asana_cli entry too", async () => {
    const backend = createMemoryBackend({ "asana_cli/api_key": "test-secret-old" });
    const store = createCredentialStore(backend);

    expect((await store.clear()).ok).toBe(true);
    expect(await backend.getPassword(LEGACY_KEYRING_SERVICE, KEYRING_ACCOUNT)).toBeUndefined();
    expect(await store.load()).toBeUndefined();
  });

  it("ignores the asana_cli entry when legacy lookup is off", async () => {
    const store = createCredentialStore(
      createMemoryBackend({ "asana_cli/api_key": "test-secret-old" }),
      { service: KEYRING_SERVICE, account: KEYRING_ACCOUNT },
      null,
    );
    expect(await store.load()).toBeUndefined();
  });

  it("returns a StoreError instead of throwing when saving fails", async () => {
    const store = createCredentialStore(failingBackend("Platform secure storage failure"));
    expect(await store.save("test-secret")).toEqual({
      ok: false,
      error: { kind: "unavailable", message: "Platform secure storage failure" },
    });
  });

  it("load resolves undefined when the backend fails", async () => {
    const store = createCredentialStore(failingBackend("keychain locked"));
    expect(await store.load()).toBeUndefined();
  });

  it("clear counts a missing entry as success", async () => {
    const store = createCredentialStore(failingBackend("No matching entry found in secure storage"));
    expect((await store.clear()).ok).toBe(true);
  });
});

describe("toStoreError", () => {
  it("classifies access refusals as denied", () => {
    expect(toStoreError(new Error("User canceled the operation"))).toEqual({
      kind: "denied",
      message: "User canceled the operation",
    });
  });

  it("classifies anything else as unavailable", () => {
    expect(toStoreError("dbus not running").kind).toBe("unavailable");
  });
});
