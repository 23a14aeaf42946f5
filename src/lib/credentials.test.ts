import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StaticCredentialProvider, TokenFileCredentialProvider } from "./credentials";
import { encryptJson } from "./encryption";
import { AuthError } from "./errors";

const HOUR = 60 * 60 * 1000;

let dir: string;
let tokenFile: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "sync-credentials-"));
  tokenFile = path.join(dir, "token.json");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function provider(options: { crmAccessToken?: string; encryptionKey?: string } = {}) {
  return new TokenFileCredentialProvider({
    crmAccessToken: options.crmAccessToken ?? "test-secret",
    googleTokenFile: tokenFile,
    encryptionKey: options.encryptionKey,
  });
}

describe("TokenFileCredentialProvider", () => {
  it("returns the configured CRM token", async () => {
    await expect(provider().getToken("CRM")).resolves.toBe("test-secret");
  });

  it("rejects a blank CRM token", async () => {
    await expect(provider({ crmAccessToken: "  " }).getToken("CRM")).rejects.toThrow(
      "AmoCRM access token is not configured"
    );
  });

  it("reads a google-auth-library token file", async () => {
    await writeFile(tokenFile, JSON.stringify({ access_token: "test-token", expiry_date: Date.now() + HOUR }));

    await expect(provider().getToken("SHEET")).resolves.toBe("test-token");
  });

  it("reads an encrypted authorized-user token file", async () => {
    const expiry = new Date(Date.now() + HOUR).toISOString();
    await writeFile(tokenFile, encryptJson({ token: "test-token", expiry }, "test-secret"));

    await expect(provider({ encryptionKey: "test-secret" }).getToken("SHEET")).resolves.toBe("test-token");
  });

  it("rejects an expired token", async () => {
    await writeFile(tokenFile, JSON.stringify({ access_token: "test-token", expiry_date: Date.now() - HOUR }));

    const attempt = provider().getToken("SHEET");
    await expect(attempt).rejects.toBeInstanceOf(AuthError);
    await expect(attempt).rejects.toThrow("Google access token expired; re-run the OAuth flow");
  });

  it("rejects a token file without a token", async () => {
    await writeFile(tokenFile, JSON.stringify({ expiry_date: Date.now() + HOUR }));

    await expect(provider().getToken("SHEET")).rejects.toThrow(
      "Google token file invalid: token file has no access token"
    );
  });

  it("rejects a missing token file", async () => {
    await expect(provider().getToken("SHEET")).rejects.toThrow(/^Google token file unreadable: /);
  });
});

describe("StaticCredentialProvider", () => {
  it("fails for a backend without a token", async () => {
    const credentials = new StaticCredentialProvider({ SHEET: "test-secret" });

    await expect(credentials.getToken("SHEET")).resolves.toBe("test-secret");
    await expect(credentials.getToken("CRM")).rejects.toThrow("CRM credentials rejected");
  });
});
