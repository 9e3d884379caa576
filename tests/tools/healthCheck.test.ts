import { describe, it } from "mocha";
import { expect } from "chai";

import type { DispatchOutcome, DispatchRequest } from "../../src/backend/dispatcher.js";
import { AuthError, BackendServiceError, TransportError } from "../../src/backend/errors.js";
import { runHealthCheck, type HealthReport } from "../../src/tools/healthCheck.js";

const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

async function checkWith(outcome: DispatchOutcome, seen: DispatchRequest[] = []): Promise<HealthReport> {
  return runHealthCheck({
    dispatcher: {
      send: async (request) => {
        seen.push(request);
        return outcome;
      },
    },
    serverName: "analytics-mcp-gateway",
    timeoutMs: 5_000,
    secrets: () => ["test-secret"],
    clock: () => FIXED_NOW,
  });
}

describe("runHealthCheck", () => {
  it("reports a healthy gateway when the catalogue endpoint answers with an object", async () => {
    const seen: DispatchRequest[] = [];

    const report = await checkWith({ ok: true, status: 200, body: { kind: "json", value: { domains: [] } } }, seen);

    expect(report).to.deep.equal({
      status: "healthy",
      server: "analytics-mcp-gateway",
      timestamp: "2026-03-01T12:00:00.000Z",
      connectivity: "connected",
      services: { session: "healthy", backend_api: "healthy" },
    });
    expect(seen).to.have.length(1);
    expect(seen[0]).to.include({ method: "GET", path: "api/askme-manager/get-domain", timeoutMs: 5_000 });
  });

  it("is degraded when the backend answers with something unexpected", async () => {
    const report = await checkWith({ ok: true, status: 200, body: { kind: "json", value: null } });

    expect(report.status).to.equal("degraded");
    expect(report.connectivity).to.equal("partial");
    expect(report.services).to.deep.equal({ session: "healthy", backend_api: "unexpected_response" });
  });

  it("is unhealthy when credentials are rejected", async () => {
    const report = await checkWith({
      ok: false,
      error: new AuthError("Authentication failed with status 403: client test-secret disabled", { httpStatus: 403 }),
    });

    const detail = "error: Authentication failed with status 403: client [REDACTED] disabled";
    expect(report.status).to.equal("unhealthy");
    expect(report.connectivity).to.equal("disconnected");
    expect(report.services).to.deep.equal({ session: detail, backend_api: detail });
  });

  it("is degraded with partial connectivity when the backend fails with a status", async () => {
    const report = await checkWith({ ok: false, error: new BackendServiceError("HTTP 503", { httpStatus: 503 }) });

    expect(report.status).to.equal("degraded");
    expect(report.connectivity).to.equal("partial");
    expect(report.services).to.deep.equal({ session: "healthy", backend_api: "error: HTTP 503" });
  });

  it("is disconnected when the backend cannot be reached", async () => {
    const report = await checkWith({
      ok: false,
      error: new TransportError("Network error: getaddrinfo ENOTFOUND analytics.test", "network"),
    });

    expect(report.status).to.equal("degraded");
    expect(report.connectivity).to.equal("disconnected");
    expect(report.services.backend_api).to.equal("error: Network error: getaddrinfo ENOTFOUND analytics.test");
  });

  it("reports a dispatcher that throws instead of rejecting the whole check", async () => {
    const report = await runHealthCheck({
      dispatcher: {
        send: async () => {
          throw new Error("socket hang up near test-secret");
        },
      },
      serverName: "analytics-mcp-gateway",
      timeoutMs: 5_000,
      secrets: () => ["test-secret"],
      clock: () => FIXED_NOW,
    });

    expect(report).to.deep.equal({
      status: "degraded",
      server: "analytics-mcp-gateway",
      timestamp: "2026-03-01T12:00:00.000Z",
      connectivity: "disconnected",
      services: { session: "healthy", backend_api: "error: Network error: socket hang up near [REDACTED]" },
    });
  });
});
