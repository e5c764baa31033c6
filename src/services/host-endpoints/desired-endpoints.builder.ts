import { V1EndpointAddress, V1Endpoints, V1Node } from "@kubernetes/client-node";
import { HostEndpointsError, HostEndpointsErrorKind, errorMessage, isHostEndpointsError } from "../../errors/host-endpoints.error";
import { getPreferredInternalIPAddressForNode } from "../../helpers/network.helper";
import { BOOTSTRAP_HOSTNAME, DNS_SUFFIX_ANNOTATION, EndpointPort } from "../../models/host-endpoints.model";
import { NetworkConfig } from "../../models/openshift-config.model";
import { MemberIdentityResolver, shortHostname } from "../dns/member-identity.resolver";

export interface DesiredEndpointsOptions {
  namespace: string;
  name: string;
  port: EndpointPort;
}

export interface DesiredEndpointsInput {
  nodes: V1Node[];
  network: NetworkConfig;
  discoveryDomain: string;
  /** Currently published object, the bootstrap member is carried over from it */
  existing?: V1Endpoints;
}

/**
 * Computes the Endpoints object listing one address per member node.
 * Either every node resolves or the build fails, nothing partial is returned.
 */
export class DesiredEndpointsBuilder {

  constructor(private readonly resolver: MemberIdentityResolver, private readonly options: DesiredEndpointsOptions) {
  }

  public async build(input: DesiredEndpointsInput): Promise<V1Endpoints> {
    let { nodes, network, discoveryDomain, existing } = input;
    if (!discoveryDomain) {
      throw new HostEndpointsError(HostEndpointsErrorKind.ConfigMissing, "unable to determine etcd discovery domain");
    }

    let addresses: V1EndpointAddress[] = [];
    for (let node of nodes) {
      let nodeName = node.metadata?.name || "";
      let { ip } = getPreferredInternalIPAddressForNode(network, node);

      let dnsName: string;
      try {
        dnsName = await this.resolver.resolveMemberHostname(discoveryDomain, ip);
      } catch (e) {
        let kind = isHostEndpointsError(e) ? e.kind : HostEndpointsErrorKind.DNSResolutionFailure;
        throw new HostEndpointsError(kind, `unable to determine etcd member dns name for node ${nodeName}: ${errorMessage(e)}`, e);
      }

      addresses.push({
        ip: ip,
        hostname: shortHostname(dnsName, discoveryDomain),
        nodeName: nodeName
      });
    }

    // counted without the bootstrap member
    if (addresses.length === 0) {
      throw new HostEndpointsError(HostEndpointsErrorKind.NoReadyMembers, "no etcd member nodes are ready");
    }

    let bootstrap = existing && findBootstrapAddress(existing);
    if (bootstrap) {
      addresses.push(bootstrap);
    }

    return {
      metadata: {
        name: this.options.name,
        namespace: this.options.namespace,
        annotations: {
          [DNS_SUFFIX_ANNOTATION]: discoveryDomain
        }
      },
      subsets: [{
        addresses: addresses,
        ports: [{ ...this.options.port }]
      }]
    };
  }

}

/**
 * @returns a copy of the bootstrap member address, if the object lists one
 */
export function findBootstrapAddress(endpoints: V1Endpoints): V1EndpointAddress | undefined {
  for (let subset of endpoints.subsets || []) {
    let address = (subset.addresses || []).find(a => a.hostname === BOOTSTRAP_HOSTNAME);
    if (address) {
      return structuredClone(address);
    }
  }
  return undefined;
}
