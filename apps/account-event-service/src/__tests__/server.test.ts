import { buildPipeline } from "../server";
import { loadConfig } from "../config";
import { InMemoryQueueTransport } from "../db/memoryQueue";

describe("buildPipeline", () => {
  const cfg = loadConfig({
    SALESFORCE_INSTANCE_URL: "https://example.my.salesforce.test",
    SALESFORCE_ACCESS_TOKEN: "test-token",
    ACCOUNT_EVENTS_QUEUE: "accounts-test",
    EVENT_SOURCE: "crm-intake",
  });

  it("should create through Salesforce and publish to the configured queue", async () => {
    const transport = new InMemoryQueueTransport();
    const urls: string[] = [];
    const pipeline = buildPipeline(cfg, {
      transport,
      fetch: async (input) => {
        urls.push(String(input));
        return new Response(JSON.stringify({ id: "001wired", success: true, errors: [] }), { status: 201 });
      },
    });

    const result = await pipeline.run({ body: { accountName: "Acme" }, queryAccountName: "Acme" });

    expect(result.response.statusCode).toBe(200);
    expect(urls).toEqual(["https://example.my.salesforce.test/services/data/v59.0/sobjects/Account/"]);
    expect(transport.messages("accounts-test")).toEqual([
      expect.objectContaining({ accountId: "001wired", accountName: "Acme", source: "crm-intake", status: "SUCCESS" }),
    ]);
  });

  it("should collapse repeated creates with the same idempotency key", async () => {
    let calls = 0;
    const pipeline = buildPipeline(cfg, {
      transport: new InMemoryQueueTransport(),
      fetch: async () => {
        calls++;
        return new Response(JSON.stringify({ id: `001n${calls}`, success: true, errors: [] }), { status: 201 });
      },
    });

    const first = await pipeline.run({ body: { accountName: "Acme" }, idempotencyKey: "same" });
    const second = await pipeline.run({ body: { accountName: "Acme" }, idempotencyKey: "same" });

    expect(calls).toBe(1);
    expect(second.response).toEqual(first.response);
  });
});
