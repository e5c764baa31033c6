
import { KubeConfig, KubernetesObject, Watch } from "@kubernetes/client-node";
import { Config } from "../config";
import { Logger } from "../helpers/logger";
import { Watcher, WatchQuery } from "./watcher";

export interface WatchSource {
  path: string;
  query: WatchQuery;
}

/**
 * The watched resources: member nodes, the published endpoints, the network and
 * infrastructure configs, and the operator resource carrying the conditions.
 */
export function watchSources(config = Config): WatchSource[] {
  let { group, version, plural, name } = config.operator;
  return [{
    path: `/api/v1/nodes`,
    query: { labelSelector: config.member.roleLabel }
  }, {
    path: `/api/v1/namespaces/${config.target.namespace}/endpoints`,
    query: { fieldSelector: `metadata.name=${config.target.endpoints}` }
  }, {
    path: `/apis/config.openshift.io/v1/networks`,
    query: { fieldSelector: `metadata.name=${config.cluster.network}` }
  }, {
    path: `/apis/config.openshift.io/v1/infrastructures`,
    query: { fieldSelector: `metadata.name=${config.cluster.infrastructure}` }
  }, {
    path: `/apis/${group}/${version}/${plural}`,
    query: { fieldSelector: `metadata.name=${name}` }
  }];
}

/**
 * Subscribes to every watch source and forwards each event to one trigger
 */
export class WatchService {

  private readonly logger = new Logger("watch-service");
  private readonly watchers: Watcher<KubernetesObject>[] = [];

  constructor(private readonly kubeConfig: KubeConfig, private readonly trigger: () => void) {
  }

  public init(sources: WatchSource[] = watchSources()): void {
    let watchClient = new Watch(this.kubeConfig);

    for (let source of sources) {
      let watcher = new Watcher<KubernetesObject>(watchClient, source.path, source.query, Config.watch.retryDelay);
      watcher.subscribe(async (type, obj) => {
        this.logger.debug(`${type} ${source.path}/${obj.metadata?.name}`);
        this.trigger();
      });
      this.watchers.push(watcher);
    }
  }

  public stop(): void {
    this.watchers.forEach(watcher => watcher.stop());
  }

}
