import { CoreV1Api, CustomObjectsApi, KubeConfig } from "@kubernetes/client-node";
import * as path from "path";
import { loadEnvs, loadFile, Config } from "./config";
import { Logger } from "./helpers/logger";
import { SystemDnsClient } from "./services/dns/dns.client";
import { MemberIdentityResolver } from "./services/dns/member-identity.resolver";
import { DesiredEndpointsBuilder } from "./services/host-endpoints/desired-endpoints.builder";
import { EndpointsApplier } from "./services/host-endpoints/endpoints.applier";
import { HostEndpointsController } from "./services/host-endpoints/host-endpoints.controller";
import { StatusReporter } from "./services/host-endpoints/status.reporter";
import { KubeEndpointsStore } from "./services/kube/endpoints.store";
import { KubeEventRecorder } from "./services/kube/event.recorder";
import { KubeOperatorStatusStore } from "./services/kube/status.store";
import { KubeTopologySource } from "./services/kube/topology.source";
import { MetricsService } from "./services/metrics.service";
import { WatchService } from "./services/watch.service";
import { WebServer } from "./services/web.service";
import { CoalescingQueue, ExponentialBackoff } from "./services/work-queue";

const logger = new Logger("main");

async function main(): Promise<void> {
  loadEnvs();
  let configFile = path.join(process.cwd(), Config.config.file);
  logger.info(`Load config from ${configFile}`);
  await loadFile(configFile);

  // Init kubernetes client
  let kubeConfig = new KubeConfig();
  kubeConfig.loadFromDefault();
  let coreApi = kubeConfig.makeApiClient(CoreV1Api);
  let customObjectsApi = kubeConfig.makeApiClient(CustomObjectsApi);

  let recorder = new KubeEventRecorder(coreApi, {
    apiVersion: "v1",
    kind: "Endpoints",
    namespace: Config.target.namespace,
    name: Config.target.endpoints
  }, `${Config.info.name}-host-etcd-endpoints-controller`);

  let endpointsStore = new KubeEndpointsStore(coreApi);
  let resolver = new MemberIdentityResolver(new SystemDnsClient(), {
    service: Config.member.service,
    proto: Config.member.proto
  });

  let controller = new HostEndpointsController({
    topology: new KubeTopologySource(coreApi, customObjectsApi),
    endpointsStore: endpointsStore,
    builder: new DesiredEndpointsBuilder(resolver, {
      namespace: Config.target.namespace,
      name: Config.target.endpoints,
      port: { name: Config.member.portName, port: Config.member.port, protocol: "TCP" }
    }),
    applier: new EndpointsApplier(endpointsStore, recorder),
    statusReporter: new StatusReporter(new KubeOperatorStatusStore(customObjectsApi, Config.operator), recorder),
    queue: new CoalescingQueue<string>(new ExponentialBackoff<string>({
      baseDelay: Config.queue.baseDelay,
      maxDelay: Config.queue.maxDelay
    }))
  }, {
    namespace: Config.target.namespace,
    endpointsName: Config.target.endpoints,
    roleLabel: Config.member.roleLabel,
    networkName: Config.cluster.network,
    infrastructureName: Config.cluster.infrastructure
  });

  let webServer = new WebServer();
  let watchService = new WatchService(kubeConfig, () => controller.enqueue());
  let metricsService = new MetricsService(() => controller.getState());

  watchService.init();
  await webServer.init(async app => {
    await metricsService.init(app);
  });

  let abortController = new AbortController();
  for (let signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, stopping`);
      watchService.stop();
      abortController.abort();
    });
  }

  controller.enqueue();
  logger.info(`Started ${Config.info.name} in ${process.uptime().toFixed(2)}s`);
  await controller.run(abortController.signal, Config.queue.workers);
  await webServer.close();
}

main().then(() => {
  process.exit(0);
}).catch(e => {
  logger.error(e);
  process.exit(1);
});
