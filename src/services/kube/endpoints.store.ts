import { CoreV1Api, V1Endpoints } from "@kubernetes/client-node";
import { HostEndpointsError, HostEndpointsErrorKind } from "../../errors/host-endpoints.error";
import { describeApiError, isConflict, isNotFound } from "../../helpers/kube.helper";

export interface EndpointsStore {

  /** @returns undefined when the object does not exist */
  get(namespace: string, name: string): Promise<V1Endpoints | undefined>;

  create(endpoints: V1Endpoints): Promise<V1Endpoints>;

  /** Replaces the whole object. Fails with a Conflict when `metadata.resourceVersion` is stale. */
  update(endpoints: V1Endpoints): Promise<V1Endpoints>;

}

export type EndpointsApi = Pick<CoreV1Api, "readNamespacedEndpoints" | "createNamespacedEndpoints" | "replaceNamespacedEndpoints">;

export class KubeEndpointsStore implements EndpointsStore {

  constructor(private readonly apiClient: EndpointsApi) {
  }

  public async get(namespace: string, name: string): Promise<V1Endpoints | undefined> {
    let res = await this.apiClient.readNamespacedEndpoints(name, namespace).catch(e => {
      if (isNotFound(e)) {
        return undefined;
      }
      throw new HostEndpointsError(HostEndpointsErrorKind.StoreReadFailure,
        describeApiError(`GET /api/v1/namespaces/${namespace}/endpoints/${name}`, e), e);
    });
    return res?.body;
  }

  public async create(endpoints: V1Endpoints): Promise<V1Endpoints> {
    let namespace = endpoints.metadata?.namespace || "";
    let res = await this.apiClient.createNamespacedEndpoints(namespace, endpoints).catch(e => {
      throw writeError(`POST /api/v1/namespaces/${namespace}/endpoints`, e);
    });
    return res.body;
  }

  public async update(endpoints: V1Endpoints): Promise<V1Endpoints> {
    let namespace = endpoints.metadata?.namespace || "";
    let name = endpoints.metadata?.name || "";
    let res = await this.apiClient.replaceNamespacedEndpoints(name, namespace, endpoints).catch(e => {
      throw writeError(`PUT /api/v1/namespaces/${namespace}/endpoints/${name}`, e);
    });
    return res.body;
  }

}

function writeError(request: string, e: unknown): HostEndpointsError {
  let kind = isConflict(e) ? HostEndpointsErrorKind.Conflict : HostEndpointsErrorKind.StoreWriteFailure;
  return new HostEndpointsError(kind, describeApiError(request, e), e);
}
