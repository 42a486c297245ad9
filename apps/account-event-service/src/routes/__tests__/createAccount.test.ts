import { handleCreateAccount, ResponseSink } from "../createAccount";
import { AccountPipeline } from "../../services/pipeline";
import { SupabaseEventPublisher } from "../../db/eventQueue";
import { InMemoryQueueTransport } from "../../db/memoryQueue";
import { RecordClient } from "../../clients/recordClient";
import { CreateResult } from "../../types/account";

class RecordingResponse implements ResponseSink {
  statusCode?: number;
  body?: unknown;

  status(code: number) {
    this.statusCode = code;
    return {
      json: (body: unknown) => {
        this.body = body;
      },
    };
  }
}

function pipelineWith(result: CreateResult, transport = new InMemoryQueueTransport()) {
  const recordClient: RecordClient = { createAccount: async () => result };
  return new AccountPipeline({
    recordClient,
    publisher: new SupabaseEventPublisher(transport),
    destination: "account-events",
    recordTimeoutMs: 1_000,
    publishTimeoutMs: 1_000,
  });
}

const created: CreateResult = { ok: true, value: { success: true, recordId: "001xx" } };

describe("POST /accounts handler", () => {
  it("should write the pipeline response", async () => {
    const res = new RecordingResponse();

    await handleCreateAccount(
      pipelineWith(created),
      { body: { accountName: "Acme", phone: "555", city: "NYC", industry: "Tech" }, query: {} },
      res
    );

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      message: "Account created and event published successfully",
      accountId: "001xx",
      success: true,
    });
  });

  it("should label the event from the accountName query parameter", async () => {
    const transport = new InMemoryQueueTransport();

    await handleCreateAccount(
      pipelineWith(created, transport),
      { body: { accountName: "Body Name" }, query: { accountName: "Query Name" } },
      new RecordingResponse()
    );

    expect(transport.messages("account-events")[0].accountName).toBe("Query Name");
  });

  it("should ignore a repeated accountName query parameter", async () => {
    const transport = new InMemoryQueueTransport();

    await handleCreateAccount(
      pipelineWith(created, transport),
      { body: { accountName: "Acme" }, query: { accountName: ["One", "Two"] } },
      new RecordingResponse()
    );

    expect(transport.messages("account-events")[0].accountName).toBe("N/A");
  });

  it("should write a 400 for an invalid body", async () => {
    const res = new RecordingResponse();

    await handleCreateAccount(pipelineWith(created), { body: { accountName: "" }, query: {} }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "Invalid Salesforce input", details: "accountName required" });
  });

  it("should finish publishing but drop the response when the caller has gone", async () => {
    const transport = new InMemoryQueueTransport();
    const res = new RecordingResponse();

    await handleCreateAccount(
      pipelineWith(created, transport),
      { body: { accountName: "Acme" }, query: {} },
      res,
      () => true
    );

    expect(transport.messages("account-events")).toHaveLength(1);
    expect(res.statusCode).toBeUndefined();
    expect(res.body).toBeUndefined();
  });

  it("should write a 500 when the pipeline itself throws", async () => {
    const res = new RecordingResponse();
    const pipeline = pipelineWith(created);
    jest.spyOn(pipeline, "run").mockRejectedValue(new Error("out of memory"));

    await handleCreateAccount(pipeline, { body: { accountName: "Acme" }, query: {} }, res);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "Unhandled error: out of memory" });
  });
});
