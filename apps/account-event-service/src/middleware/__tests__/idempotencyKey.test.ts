import { extractIdempotencyKey } from "../idempotencyKey";

describe("extractIdempotencyKey", () => {
  it("should read the Idempotency-Key header", () => {
    expect(extractIdempotencyKey({ "idempotency-key": "order-42" }, {})).toEqual({ ok: true, key: "order-42" });
  });

  it("should fall back to the idempotencyKey query param", () => {
    expect(extractIdempotencyKey({}, { idempotencyKey: "order-42" })).toEqual({ ok: true, key: "order-42" });
  });

  it("should prefer the header over the query param", () => {
    expect(
      extractIdempotencyKey({ "idempotency-key": "from-header" }, { idempotencyKey: "from-query" })
    ).toEqual({ ok: true, key: "from-header" });
  });

  it("should allow requests without a key", () => {
    expect(extractIdempotencyKey({}, {})).toEqual({ ok: true, key: undefined });
  });

  it.each([
    ["containing spaces", "order 42"],
    ["longer than 255 characters", "k".repeat(256)],
  ])("should reject a key %s", (_label, key) => {
    expect(extractIdempotencyKey({ "idempotency-key": key }, {})).toEqual({
      ok: false,
      details: "Idempotency-Key must be 1-255 visible ASCII characters",
    });
  });

  it("should reject a repeated query param", () => {
    expect(extractIdempotencyKey({}, { idempotencyKey: ["a", "b"] }).ok).toBe(false);
  });
});
