import { describe, it, expect } from "vitest";
import * as path from "path";
import { Registry } from "prom-client";
import request from "supertest";
import { HostEndpointsState } from "../../models/host-endpoints.model";
import { MetricsService } from "../metrics.service";
import { WebServer } from "../web.service";

describe("WebServer", () => {
  it("answers health checks", async () => {
    let app = await new WebServer().createApp();

    let res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.text).toBe("healthy");
  });

  it("serves an index for unknown paths", async () => {
    let app = await new WebServer().createApp();

    let res = await request(app).get("/unknown");

    expect(res.status).toBe(404);
    expect(res.text).toContain("<h1>host-endpoints-operator</h1>");
  });

  it("turns route errors into a 500", async () => {
    let app = await new WebServer().createApp(async routes => {
      routes.get("/broken", () => {
        throw new Error("broken route");
      });
    });

    let res = await request(app).get("/broken");

    expect(res.status).toBe(500);
    expect(res.text).toBe("Internal server error");
  });
});

describe("MetricsService", () => {
  it("exposes the controller state", async () => {
    let state: HostEndpointsState = {
      degraded: true,
      addresses: 3,
      successfulSyncs: 5,
      failedSyncs: 2,
      lastError: "no etcd member nodes are ready"
    };
    let metrics = new MetricsService(() => state, new Registry(), path.join(process.cwd(), "package.json"));
    let app = await new WebServer().createApp(routes => metrics.init(routes));

    let res = await request(app).get("/metrics");

    expect(res.status).toBe(200);
    let lines = res.text.split("\n");
    expect(lines).toContain('build_info{version="1.0.0"} 1');
    expect(lines).toContain("host_endpoints_degraded 1");
    expect(lines).toContain("host_endpoints_addresses 3");
    expect(lines).toContain('host_endpoints_syncs{result="success"} 5');
    expect(lines).toContain('host_endpoints_syncs{result="failure"} 2');
  });
});
