import { Application } from "express";
import { promises as fs } from "fs";
import { Gauge, Registry, collectDefaultMetrics } from "prom-client";
import * as pathUtil from "path";
import { HostEndpointsState } from "../models/host-endpoints.model";

export class MetricsService {

  private readonly buildInfoGauge: Gauge<"version">;
  private readonly degradedGauge: Gauge;
  private readonly addressesGauge: Gauge;
  private readonly syncsGauge: Gauge<"result">;

  constructor(
    private getState: () => HostEndpointsState,
    private registry: Registry = new Registry(),
    private packageJsonFile: string = pathUtil.join(__dirname, "../../package.json")
  ) {
    this.buildInfoGauge = new Gauge({
      name: "build_info",
      help: "Build info",
      labelNames: ["version"],
      registers: [registry]
    });

    this.degradedGauge = new Gauge({
      name: "host_endpoints_degraded",
      help: "1 when the last sync of the host-etcd endpoints failed",
      registers: [registry]
    });

    this.addressesGauge = new Gauge({
      name: "host_endpoints_addresses",
      help: "Addresses computed for the host-etcd endpoints by the last sync",
      registers: [registry]
    });

    this.syncsGauge = new Gauge({
      name: "host_endpoints_syncs",
      help: "Syncs of the host-etcd endpoints since start, by result",
      labelNames: ["result"],
      registers: [registry]
    });
  }

  public async init(app: Application): Promise<void> {
    // Setup metrics
    collectDefaultMetrics({ register: this.registry });

    // Metrics endpoint
    app.get("/metrics", (req, res, next) => {
      // Collect metrics
      this.collectMetrics().then(() => this.registry.metrics()).then(metrics => {
        // Send prometheus response
        res.status(200).type(this.registry.contentType).send(metrics);
      }).catch(e => next(e));
    });
  }

  private async collectMetrics(): Promise<void> {
    let packageJson: unknown = JSON.parse((await fs.readFile(this.packageJsonFile)).toString());
    let version = typeof packageJson === "object" && packageJson !== null && "version" in packageJson
      ? String(packageJson.version)
      : "unknown";

    this.buildInfoGauge.set({ version: version }, 1);

    let state = this.getState();
    this.degradedGauge.set(state.degraded ? 1 : 0);
    this.addressesGauge.set(state.addresses);
    this.syncsGauge.set({ result: "success" }, state.successfulSyncs);
    this.syncsGauge.set({ result: "failure" }, state.failedSyncs);
  }

}
