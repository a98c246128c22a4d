import { describe, it, expect } from "vitest";
import { createMockService, STATUS } from "../test-support/mock-service.js";
import { healthRoute } from "./health.js";

describe("healthRoute", () => {
  function createApp() {
    return healthRoute({
      version: "0.0.1",
      startedAt: new Date(),
      service: createMockService(),
    });
  }

  it("GET /health returns 200", async () => {
    const res = await createApp().request("/health");
    expect(res.status).toBe(200);
  });

  it("body has status, version and uptime", async () => {
    const res = await createApp().request("/health");
    const body = await res.json();

    expect(body.status).toBe("healthy");
    expect(body.version).toBe("0.0.1");
    expect(typeof body.uptime).toBe("number");
    expect(body.uptime).toBeGreaterThanOrEqual(0);
  });

  it("uptime counts seconds since start", async () => {
    const app = healthRoute({
      version: "0.0.1",
      startedAt: new Date(Date.now() - 90_500),
      service: createMockService(),
    });
    const body = await (await app.request("/health")).json();
    expect(body.uptime).toBeGreaterThanOrEqual(90);
  });

  it("GET /status returns the service snapshot", async () => {
    const res = await createApp().request("/status");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.status).toBe("ok");
    expect(body.serviceInfo).toEqual(STATUS);
    expect(typeof body.timestamp).toBe("string");
  });
});
