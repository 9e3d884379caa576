import { describe, it } from "mocha";
import { expect } from "chai";

import { ClientCredentialsExchange } from "../../src/backend/authClient.js";
import { CredentialStore } from "../../src/backend/credentials.js";
import { RequestDispatcher, type DispatchOutcome } from "../../src/backend/dispatcher.js";
import {
  AuthError,
  BackendServiceError,
  BackendValidationError,
  type GatewayError,
  TransportError,
} from "../../src/backend/errors.js";
import { SessionManager, StaticTokenSource, type TokenSource } from "../../src/backend/session.js";
import { collectChunks } from "../../src/backend/stream.js";
import {
  FakeBackend,
  LOGIN_ROUTE,
  TEST_BASE_URL,
  hangingResponder,
  jsonResponse,
  stallingStreamResponse,
  streamResponse,
} from "../helpers/fakeBackend.js";

const TREND_PATH = "api/ai-engine/mcp/get-trend-data";
const TREND_ROUTE = `/${TREND_PATH}`;
const payload = { userQuery: "Revenue trend by month", schemaId: 42 };

/** Login endpoint issuing `token-1`, `token-2`, … on successive calls. */
function withSequentialLogin(backend: FakeBackend, cookie?: string): FakeBackend {
  let issued = 0;
  return backend.on("POST", LOGIN_ROUTE, () => {
    issued += 1;
    return jsonResponse({ access_token: `token-${issued}`, expires_in: 600, ...(cookie ? { cookie } : {}) });
  });
}

function sessionFor(backend: FakeBackend): SessionManager {
  return new SessionManager({
    credentials: new CredentialStore("client-1", "test-secret"),
    exchange: new ClientCredentialsExchange({ baseUrl: TEST_BASE_URL, timeoutMs: 1_000, fetchImpl: backend.fetch }),
  });
}

function dispatcherFor(backend: FakeBackend, tokenSource: TokenSource = sessionFor(backend)): RequestDispatcher {
  return new RequestDispatcher({
    baseUrl: TEST_BASE_URL,
    tokenSource,
    fetchImpl: backend.fetch,
    defaultTimeoutMs: 1_000,
  });
}

function expectFailure(outcome: DispatchOutcome): GatewayError {
  if (outcome.ok) {
    throw new Error("expected a failed outcome");
  }
  return outcome.error;
}

describe("RequestDispatcher", () => {
  it("sends an authenticated JSON request and returns the parsed body", async () => {
    const backend = withSequentialLogin(new FakeBackend(), "SESSION=abc").on("POST", TREND_ROUTE, () =>
      jsonResponse({ trend: "up" }),
    );

    const outcome = await dispatcherFor(backend).send({
      method: "POST",
      path: TREND_PATH,
      payload,
      responseType: "json",
    });

    expect(outcome).to.deep.equal({ ok: true, status: 200, body: { kind: "json", value: { trend: "up" } } });
    const [call] = backend.callsTo(TREND_ROUTE);
    expect(call?.headers.get("authorization")).to.equal("Bearer token-1");
    expect(call?.headers.get("cookie")).to.equal("SESSION=abc");
    expect(call?.headers.get("content-type")).to.equal("application/json");
    expect(call?.body).to.deep.equal(payload);
  });

  it("encodes query parameters and omits the body on GET", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("GET", "/api/askme-manager/get-domain", () =>
      jsonResponse({ data: [] }),
    );

    await dispatcherFor(backend).send({
      method: "GET",
      path: "api/askme-manager/get-domain",
      payload: { ignored: true },
      query: { page: 2, q: "sales data" },
      responseType: "json",
    });

    const [call] = backend.callsTo("/api/askme-manager/get-domain");
    expect(call?.url.search).to.equal("?page=2&q=sales+data");
    expect(call?.body).to.equal(undefined);
    expect(call?.headers.has("content-type")).to.equal(false);
  });

  it("refreshes the token and retries once after a 401", async () => {
    const backend = withSequentialLogin(new FakeBackend())
      .once("POST", TREND_ROUTE, () => jsonResponse({ message: "expired" }, 401))
      .on("POST", TREND_ROUTE, () => jsonResponse({ trend: "flat" }));

    const outcome = await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" });

    expect(outcome.ok).to.equal(true);
    const calls = backend.callsTo(TREND_ROUTE);
    expect(calls.map((call) => call.headers.get("authorization"))).to.deep.equal([
      "Bearer token-1",
      "Bearer token-2",
    ]);
    expect(backend.callsTo(LOGIN_ROUTE)).to.have.length(2);
  });

  it("logs in once more for any number of calls rejected with the same token", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, (call) =>
      call.headers.get("authorization") === "Bearer token-1"
        ? jsonResponse({ message: "Token expired" }, 401)
        : jsonResponse({ trend: "up" }),
    );
    const dispatcher = dispatcherFor(backend);

    const outcomes = await Promise.all(
      Array.from({ length: 10 }, () =>
        dispatcher.send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
      ),
    );

    expect(outcomes.every((outcome) => outcome.ok)).to.equal(true);
    expect(backend.callsTo(LOGIN_ROUTE)).to.have.length(2);
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(20);
    expect(
      backend
        .callsTo(TREND_ROUTE)
        .filter((call) => call.headers.get("authorization") === "Bearer token-2"),
    ).to.have.length(10);
  });

  it("fails with AuthError when the retry is rejected as well", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, () =>
      jsonResponse({ message: "expired" }, 401),
    );

    const error = expectFailure(
      await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
    );

    expect(error).to.be.instanceOf(AuthError);
    expect(error.message).to.equal("The analytics backend rejected the refreshed credentials (HTTP 401)");
    expect(error.httpStatus).to.equal(401);
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(2);
    expect(backend.callsTo(LOGIN_ROUTE)).to.have.length(2);
  });

  it("retries a static key once and then reports the rejection", async () => {
    const backend = new FakeBackend().on("POST", TREND_ROUTE, () => jsonResponse({}, 401));

    const error = expectFailure(
      await dispatcherFor(backend, new StaticTokenSource("test-api-key")).send({
        method: "POST",
        path: TREND_PATH,
        payload,
        responseType: "json",
      }),
    );

    expect(error).to.be.instanceOf(AuthError);
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(2);
    expect(backend.callsTo(LOGIN_ROUTE)).to.have.length(0);
  });

  it("maps other 4xx responses to BackendValidationError without retrying", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, () =>
      jsonResponse({ message: "Schema 9 not found" }, 404),
    );

    const error = expectFailure(
      await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
    );

    expect(error).to.be.instanceOf(BackendValidationError);
    expect(error.message).to.equal("Schema 9 not found");
    expect(error.envelopeStatus).to.equal("validation_error");
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(1);
  });

  it("maps 5xx responses to BackendServiceError", async () => {
    const backend = withSequentialLogin(new FakeBackend())
      .once("POST", TREND_ROUTE, () => new Response("Upstream timeout", { status: 503 }))
      .once("POST", TREND_ROUTE, () => new Response("", { status: 500 }));
    const dispatcher = dispatcherFor(backend);

    const first = expectFailure(await dispatcher.send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }));
    const second = expectFailure(await dispatcher.send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }));

    expect(first).to.be.instanceOf(BackendServiceError);
    expect(first.message).to.equal("Upstream timeout");
    expect(first.envelopeStatus).to.equal("error");
    expect(second.message).to.equal("HTTP 500");
  });

  it("rejects malformed JSON on a successful status", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on(
      "POST",
      TREND_ROUTE,
      () => new Response("{not json", { status: 200 }),
    );

    const error = expectFailure(
      await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
    );

    expect(error).to.be.instanceOf(BackendServiceError);
    expect(error.message).to.equal("The analytics backend returned malformed JSON (HTTP 200)");
  });

  it("returns null for an empty successful body", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on(
      "POST",
      TREND_ROUTE,
      () => new Response(null, { status: 204 }),
    );

    const outcome = await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" });
    expect(outcome).to.deep.equal({ ok: true, status: 204, body: { kind: "json", value: null } });
  });

  it("maps network failures to TransportError without retrying", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, () => {
      throw new TypeError("fetch failed");
    });

    const error = expectFailure(
      await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
    );

    expect(error).to.be.instanceOf(TransportError);
    expect(error instanceof TransportError ? error.reason : null).to.equal("network");
    expect(error.message).to.equal("Network error: fetch failed");
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(1);
  });

  it("aborts the request when the deadline elapses", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, hangingResponder());

    const startedAt = Date.now();
    const error = expectFailure(
      await dispatcherFor(backend).send({
        method: "POST",
        path: TREND_PATH,
        payload,
        responseType: "json",
        timeoutMs: 30,
      }),
    );

    expect(Date.now() - startedAt).to.be.lessThan(1_000);
    expect(error instanceof TransportError ? error.reason : null).to.equal("timeout");
    expect(error.message).to.equal("Request timed out after 30ms");
    expect(backend.callsTo(TREND_ROUTE)[0]?.signal?.aborted).to.equal(true);
  });

  it("reports caller cancellation separately from timeouts", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", TREND_ROUTE, hangingResponder());
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const error = expectFailure(
      await dispatcherFor(backend).send({
        method: "POST",
        path: TREND_PATH,
        payload,
        responseType: "json",
        signal: controller.signal,
      }),
    );

    expect(error instanceof TransportError ? error.reason : null).to.equal("cancelled");
    expect(error.message).to.equal("Request was cancelled");
  });

  it("surfaces credential failures without calling the endpoint", async () => {
    const backend = new FakeBackend()
      .on("POST", LOGIN_ROUTE, () => jsonResponse({ message: "Invalid client" }, 403))
      .on("POST", TREND_ROUTE, () => jsonResponse({}));

    const error = expectFailure(
      await dispatcherFor(backend).send({ method: "POST", path: TREND_PATH, payload, responseType: "json" }),
    );

    expect(error).to.be.instanceOf(AuthError);
    expect(error.message).to.equal("Authentication failed with status 403: Invalid client");
    expect(backend.callsTo(TREND_ROUTE)).to.have.length(0);
  });

  it("exposes streamed bodies as a lazy chunk sequence", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", "/api/ai-engine/mcp/nlq-to-data", () =>
      streamResponse(['{"rows":', "[1,2]", "}"]),
    );

    const outcome = await dispatcherFor(backend).send({
      method: "POST",
      path: "api/ai-engine/mcp/nlq-to-data",
      payload,
      responseType: "stream",
    });

    if (!outcome.ok || outcome.body.kind !== "stream") {
      throw new Error("expected a stream outcome");
    }
    expect(await collectChunks(outcome.body.chunks)).to.equal('{"rows":[1,2]}');
  });

  it("keeps the deadline armed while a stream is being read", async () => {
    const backend = withSequentialLogin(new FakeBackend()).on("POST", "/api/ai-engine/mcp/nlq-to-data", (call) =>
      stallingStreamResponse('{"rows":', call.signal),
    );

    const outcome = await dispatcherFor(backend).send({
      method: "POST",
      path: "api/ai-engine/mcp/nlq-to-data",
      payload,
      responseType: "stream",
      timeoutMs: 30,
    });
    if (!outcome.ok || outcome.body.kind !== "stream") {
      throw new Error("expected a stream outcome");
    }

    let caught: unknown = null;
    try {
      await collectChunks(outcome.body.chunks);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(TransportError);
    expect(caught instanceof TransportError ? caught.reason : null).to.equal("timeout");
  });
});
