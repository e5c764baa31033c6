import { HostEndpointsError, HostEndpointsErrorKind, errorMessage } from "../../errors/host-endpoints.error";
import { Logger } from "../../helpers/logger";
import { ApplyResult, HostEndpointsState } from "../../models/host-endpoints.model";
import { EndpointsStore } from "../kube/endpoints.store";
import { TopologySource } from "../kube/topology.source";
import { CoalescingQueue } from "../work-queue";
import { DesiredEndpointsBuilder } from "./desired-endpoints.builder";
import { EndpointsApplier } from "./endpoints.applier";
import { StatusReporter } from "./status.reporter";

export const WORK_QUEUE_KEY = "key";

export interface HostEndpointsControllerOptions {
  namespace: string;
  endpointsName: string;
  roleLabel: string;
  networkName: string;
  infrastructureName: string;
}

export interface HostEndpointsControllerDeps {
  topology: TopologySource;
  endpointsStore: EndpointsStore;
  builder: DesiredEndpointsBuilder;
  applier: EndpointsApplier;
  statusReporter: StatusReporter;
  queue: CoalescingQueue<string>;
}

/**
 * Maintains the host-etcd Endpoints object with the dns names of the current
 * etcd members, for components unable to use the etcd service directly.
 */
export class HostEndpointsController {

  private readonly logger = new Logger("host-endpoints-controller");
  private readonly state: HostEndpointsState = {
    degraded: false,
    addresses: 0,
    successfulSyncs: 0,
    failedSyncs: 0
  };

  constructor(private readonly deps: HostEndpointsControllerDeps, private readonly options: HostEndpointsControllerOptions) {
  }

  public getState(): HostEndpointsState {
    return { ...this.state };
  }

  /**
   * Every watched change lands here, they all collapse into one pending sync
   */
  public enqueue(): void {
    this.deps.queue.add(WORK_QUEUE_KEY);
  }

  /**
   * Runs workers until the signal aborts. Resolves once the sync in flight, if any, has finished.
   */
  public async run(signal: AbortSignal, workers = 1): Promise<void> {
    this.logger.info("Starting HostEtcdEndpointsController");
    let shutDown = () => this.deps.queue.shutDown();
    if (signal.aborted) {
      shutDown();
    } else {
      signal.addEventListener("abort", shutDown, { once: true });
    }

    let loops: Promise<void>[] = [];
    for (let i = 0; i < Math.max(1, workers); i++) {
      loops.push(this.runWorker());
    }
    await Promise.all(loops);
    this.logger.info("Shutting down HostEtcdEndpointsController");
  }

  private async runWorker(): Promise<void> {
    while (await this.processNextWorkItem()) {
      // next item
    }
  }

  /**
   * @returns false once the queue has shut down
   */
  public async processNextWorkItem(): Promise<boolean> {
    let key = await this.deps.queue.get();
    if (key === undefined) {
      return false;
    }
    try {
      await this.sync();
      this.deps.queue.forget(key);
    } catch (e) {
      this.logger.error(`${key} failed with:`, e);
      this.deps.queue.addRateLimited(key);
    } finally {
      this.deps.queue.done(key);
    }
    return true;
  }

  /**
   * One reconcile attempt, reported through the degraded condition
   */
  public async sync(): Promise<void> {
    let error: unknown;
    try {
      let result = await this.syncHostEndpoints();
      this.logger.debug(`sync finished: ${result}`);
    } catch (e) {
      error = e;
    }

    if (error === undefined) {
      this.state.degraded = false;
      this.state.successfulSyncs++;
      delete this.state.lastError;
    } else {
      this.state.degraded = true;
      this.state.failedSyncs++;
      this.state.lastError = errorMessage(error);
    }
    await this.deps.statusReporter.reportOutcome(error);
  }

  public async syncHostEndpoints(): Promise<ApplyResult> {
    let { namespace, endpointsName } = this.options;

    // the object must exist, the etcd-bootstrap member is only known from it
    let existing = await this.deps.endpointsStore.get(namespace, endpointsName);
    if (!existing) {
      throw new HostEndpointsError(HostEndpointsErrorKind.EndpointsMissing,
        `endpoints/${endpointsName} -n ${namespace} must exist before it can be kept up to date`);
    }

    let infrastructure = await this.deps.topology.getInfrastructureConfig(this.options.infrastructureName);
    let discoveryDomain = infrastructure.status.etcdDiscoveryDomain;
    if (!discoveryDomain) {
      throw new HostEndpointsError(HostEndpointsErrorKind.ConfigMissing,
        `unable to determine etcd discovery domain: infrastructures.config.openshift.io/${this.options.infrastructureName} missing .status.etcdDiscoveryDomain`);
    }

    let network = await this.deps.topology.getNetworkConfig(this.options.networkName);
    let nodes = await this.deps.topology.listMemberNodes(`${this.options.roleLabel}=`);

    let required = await this.deps.builder.build({ nodes, network, discoveryDomain, existing });
    this.state.addresses = required.subsets?.[0]?.addresses?.length || 0;

    return this.deps.applier.apply(required);
  }

}
