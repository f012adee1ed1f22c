import { PendingStateSet } from "./pending-state-set.js";

describe("PendingStateSet", () => {
  it("issues distinct tokens and keeps all of them pending", () => {
    const states = new PendingStateSet();

    const first = states.issue();
    const second = states.issue();

    expect(first).not.toBe(second);
    expect(states.has(first)).toBe(true);
    expect(states.has(second)).toBe(true);
    expect(states.size).toBe(2);
  });

  it("issues url-safe tokens carrying 256 bits", () => {
    const token = new PendingStateSet().issue();

    expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
    // 32 bytes base64url-encoded without padding
    expect(token).toHaveLength(43);
  });

  it("consumes a token exactly once", () => {
    const states = new PendingStateSet();
    const token = states.issue();

    expect(states.consume(token)).toBe(true);
    expect(states.consume(token)).toBe(false);
    expect(states.has(token)).toBe(false);
  });

  it("does not consume unknown tokens", () => {
    const states = new PendingStateSet();
    states.issue();

    expect(states.consume("never-issued")).toBe(false);
    expect(states.size).toBe(1);
  });

  it("clears every token", () => {
    const states = new PendingStateSet();
    const token = states.issue();
    states.issue();

    states.clear();

    expect(states.size).toBe(0);
    expect(states.has(token)).toBe(false);
  });

  it("keeps separate instances independent", () => {
    const a = new PendingStateSet();
    const b = new PendingStateSet();
    const token = a.issue();

    expect(b.has(token)).toBe(false);
  });
});
