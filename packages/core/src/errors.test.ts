import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { AuthorizationError, describeError, errorCode } from "./errors.js";

describe("describeError", () => {
  it("uses the message of an Error", () => {
    expect(describeError(new AuthorizationError("provider_denied", "access_denied"))).toBe(
      "Authorization failed: access_denied"
    );
  });

  it("reads the message of an error-shaped object that is not an Error instance", () => {
    expect(describeError({ message: "EISDIR: illegal operation on a directory", code: "EISDIR" })).toBe(
      "EISDIR: illegal operation on a directory"
    );
  });

  it("stringifies anything else", () => {
    expect(describeError("boom")).toBe("boom");
    expect(describeError(42)).toBe("42");
  });
});

describe("errorCode", () => {
  it("reads the code without relying on instanceof", () => {
    expect(errorCode({ code: "ENOENT" })).toBe("ENOENT");
  });

  it("is undefined for values without a string code", () => {
    expect(errorCode(new Error("plain"))).toBeUndefined();
    expect(errorCode({ code: 7 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });

  it("recognizes a missing file reported by fs", async () => {
    const missing = path.join(os.tmpdir(), `errors-test-${process.pid}-missing.json`);

    const thrown = await fs.readFile(missing, "utf-8").then(
      () => null,
      (error: unknown) => error
    );

    expect(errorCode(thrown)).toBe("ENOENT");
  });
});
