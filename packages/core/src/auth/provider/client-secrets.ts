import * as fs from "node:fs/promises";
import {
  ClientSecretsFileSchema,
  OAuthClientConfigSchema,
  type ClientSecretsEntry,
  type OAuthClientConfig,
} from "@meeting-minutes/types";
import { ConfigurationError, describeError, errorCode } from "../../errors.js";

export type ClientConfigLoader = () => Promise<OAuthClientConfig | null>;

export interface ClientConfigSource {
  clientId?: string;
  clientSecret?: string;
  redirectUri: string;
  scopes: string[];
  /** Optional client-secret file; its values win over the ones above */
  credentialsFile?: string;
}

/**
 * Read a Google client-secret file. Returns null when the file does not exist.
 */
export async function readClientSecretsFile(filePath: string): Promise<ClientSecretsEntry | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw new ConfigurationError([], `Cannot read ${filePath}: ${describeError(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([], `${filePath} is not valid JSON: ${describeError(error)}`);
  }

  const parsed = ClientSecretsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError([], `${filePath} is not a Google client-secret file`);
  }
  return parsed.data.web ?? parsed.data.installed ?? null;
}

/**
 * Create a loader that resolves the OAuth client on every call, so edits to
 * the client-secret file are picked up without a restart.
 * Resolves to null when no client id or secret is available.
 */
export function createClientConfigLoader(source: ClientConfigSource): ClientConfigLoader {
  return async () => {
    const fromFile = source.credentialsFile
      ? await readClientSecretsFile(source.credentialsFile)
      : null;

    const clientId = fromFile?.client_id ?? source.clientId;
    const clientSecret = fromFile?.client_secret ?? source.clientSecret;
    if (!clientId || !clientSecret) {
      return null;
    }

    return OAuthClientConfigSchema.parse({
      clientId,
      clientSecret,
      redirectUri: source.redirectUri,
      scopes: source.scopes,
      authUri: fromFile?.auth_uri,
      tokenUri: fromFile?.token_uri,
    });
  };
}
