import { readFile } from "node:fs/promises";
import { isPast, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { decryptJson } from "@/lib/encryption";
import { AuthError, errorMessage } from "@/lib/errors";
import type { Backend, CredentialProvider } from "@/lib/sync/types";

// Accepts both the google-auth-library layout (access_token, expiry_date in ms)
// and the authorized-user layout written by other OAuth helpers (token, expiry).
const googleTokenSchema = z
  .object({
    access_token: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
    expiry_date: z.number().optional(),
    expiry: z.string().optional(),
  })
  .refine((t) => t.access_token || t.token, { message: "token file has no access token" });

type GoogleToken = z.infer<typeof googleTokenSchema>;

function expiresAt(token: GoogleToken): Date | null {
  if (token.expiry_date !== undefined) return new Date(token.expiry_date);
  if (token.expiry) {
    const parsed = parseISO(token.expiry);
    return isValid(parsed) ? parsed : null;
  }
  return null;
}

export interface TokenFileCredentialOptions {
  crmAccessToken: string;
  googleTokenFile: string;
  encryptionKey?: string;
}

/**
 * CRM token from configuration, Google token from a token file kept fresh by
 * an external OAuth helper. Expired or missing credentials are AuthErrors;
 * refreshing them is not this process's job.
 */
export class TokenFileCredentialProvider implements CredentialProvider {
  constructor(private readonly options: TokenFileCredentialOptions) {}

  async getToken(backend: Backend): Promise<string> {
    if (backend === "CRM") {
      const token = this.options.crmAccessToken.trim();
      if (!token) throw new AuthError("CRM", "AmoCRM access token is not configured");
      return token;
    }
    return this.readGoogleToken();
  }

  private async readGoogleToken(): Promise<string> {
    let raw: string;
    try {
      raw = await readFile(this.options.googleTokenFile, "utf8");
    } catch (err) {
      throw new AuthError("SHEET", `Google token file unreadable: ${errorMessage(err)}`);
    }

    let data: unknown;
    try {
      data = this.options.encryptionKey
        ? decryptJson(raw.trim(), this.options.encryptionKey)
        : JSON.parse(raw);
    } catch (err) {
      throw new AuthError("SHEET", `Google token file invalid: ${errorMessage(err)}`);
    }

    const parsed = googleTokenSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError("SHEET", `Google token file invalid: ${parsed.error.issues[0]?.message ?? "bad shape"}`);
    }

    const expiry = expiresAt(parsed.data);
    if (expiry && isPast(expiry)) {
      throw new AuthError("SHEET", "Google access token expired; re-run the OAuth flow");
    }
    return parsed.data.access_token ?? parsed.data.token ?? "";
  }
}

export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly tokens: Partial<Record<Backend, string>>) {}

  async getToken(backend: Backend): Promise<string> {
    const token = this.tokens[backend];
    if (!token) throw new AuthError(backend);
    return token;
  }
}
