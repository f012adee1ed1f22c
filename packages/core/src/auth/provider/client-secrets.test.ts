import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigurationError } from "../../errors.js";
import { createClientConfigLoader, readClientSecretsFile } from "./client-secrets.js";

describe("client secrets", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "client-secrets-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const base = {
    redirectUri: "http://localhost:7860/oauth/callback",
    scopes: ["https://www.googleapis.com/auth/drive.readonly"],
  };

  it("returns null for a missing file", async () => {
    await expect(readClientSecretsFile(path.join(dir, "missing.json"))).resolves.toBeNull();
  });

  it("reads an installed-app client file", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(
      file,
      JSON.stringify({
        installed: {
          client_id: "file-id",
          client_secret: "file-secret",
          token_uri: "https://oauth2.googleapis.com/token",
        },
      })
    );

    await expect(readClientSecretsFile(file)).resolves.toEqual({
      client_id: "file-id",
      client_secret: "file-secret",
      token_uri: "https://oauth2.googleapis.com/token",
    });
  });

  it("rejects a file that is not a client-secret file", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(file, JSON.stringify({ something: "else" }));

    await expect(readClientSecretsFile(file)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("builds the client from environment values when there is no file", async () => {
    const load = createClientConfigLoader({
      ...base,
      clientId: "env-id",
      clientSecret: "env-secret",
      credentialsFile: path.join(dir, "missing.json"),
    });

    await expect(load()).resolves.toEqual({
      clientId: "env-id",
      clientSecret: "env-secret",
      ...base,
      authUri: "https://accounts.google.com/o/oauth2/v2/auth",
      tokenUri: "https://oauth2.googleapis.com/token",
    });
  });

  it("prefers values from the client-secret file", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(
      file,
      JSON.stringify({
        web: {
          client_id: "file-id",
          client_secret: "file-secret",
          auth_uri: "https://accounts.google.com/o/oauth2/auth",
        },
      })
    );
    const load = createClientConfigLoader({
      ...base,
      clientId: "env-id",
      clientSecret: "env-secret",
      credentialsFile: file,
    });

    const client = await load();

    expect(client?.clientId).toBe("file-id");
    expect(client?.clientSecret).toBe("file-secret");
    expect(client?.authUri).toBe("https://accounts.google.com/o/oauth2/auth");
  });

  it("resolves to null without a client id or secret", async () => {
    const load = createClientConfigLoader({ ...base, clientId: "env-id" });
    await expect(load()).resolves.toBeNull();
  });
});
