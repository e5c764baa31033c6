import { CoreV1Api, CustomObjectsApi, V1Node } from "@kubernetes/client-node";
import { ZodType, ZodTypeDef } from "zod";
import { HostEndpointsError, HostEndpointsErrorKind } from "../../errors/host-endpoints.error";
import { describeApiError } from "../../helpers/kube.helper";
import {
  InfrastructureConfig,
  InfrastructureConfigSchema,
  NetworkConfig,
  NetworkConfigSchema
} from "../../models/openshift-config.model";

const CONFIG_GROUP = "config.openshift.io";
const CONFIG_VERSION = "v1";

/**
 * Read-only view of the cluster members and the cluster-wide configuration
 */
export interface TopologySource {

  listMemberNodes(labelSelector: string): Promise<V1Node[]>;

  getNetworkConfig(name: string): Promise<NetworkConfig>;

  getInfrastructureConfig(name: string): Promise<InfrastructureConfig>;

}

export class KubeTopologySource implements TopologySource {

  constructor(
    private readonly coreApi: Pick<CoreV1Api, "listNode">,
    private readonly customObjectsApi: Pick<CustomObjectsApi, "getClusterCustomObject">
  ) {
  }

  public async listMemberNodes(labelSelector: string): Promise<V1Node[]> {
    let res = await this.coreApi.listNode(undefined, undefined, undefined, undefined, labelSelector).catch(e => {
      throw new HostEndpointsError(HostEndpointsErrorKind.StoreReadFailure,
        `unable to list expected etcd member nodes: ${describeApiError(`GET /api/v1/nodes?labelSelector=${labelSelector}`, e)}`, e);
    });
    return res.body.items;
  }

  public getNetworkConfig(name: string): Promise<NetworkConfig> {
    return this.getConfig("networks", name, NetworkConfigSchema);
  }

  public getInfrastructureConfig(name: string): Promise<InfrastructureConfig> {
    return this.getConfig("infrastructures", name, InfrastructureConfigSchema);
  }

  private async getConfig<T>(plural: string, name: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let request = `GET /apis/${CONFIG_GROUP}/${CONFIG_VERSION}/${plural}/${name}`;
    let res = await this.customObjectsApi.getClusterCustomObject(CONFIG_GROUP, CONFIG_VERSION, plural, name).catch(e => {
      throw new HostEndpointsError(HostEndpointsErrorKind.StoreReadFailure, describeApiError(request, e), e);
    });
    let parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new HostEndpointsError(HostEndpointsErrorKind.StoreReadFailure,
        `${plural}.${CONFIG_GROUP}/${name} is malformed: ${parsed.error.message}`, parsed.error);
    }
    return parsed.data;
  }

}
