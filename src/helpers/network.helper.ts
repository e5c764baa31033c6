import { V1Node } from "@kubernetes/client-node";
import { isIPv4, isIPv6 } from "net";
import { HostEndpointsError, HostEndpointsErrorKind } from "../errors/host-endpoints.error";
import { NetworkConfig } from "../models/openshift-config.model";
import { getInternalIPs } from "./kube.helper";

export type IPFamily = "tcp4" | "tcp6";

export function getPreferredIPFamily(network: NetworkConfig): IPFamily {
  let serviceNetwork = network.status.serviceNetwork;
  if (serviceNetwork.length === 0) {
    throw new HostEndpointsError(HostEndpointsErrorKind.ConfigMissing,
      "required serviceNetwork not found in networks.config.openshift.io/cluster status");
  }
  let address = serviceNetwork[0].split("/")[0];
  if (isIPv4(address)) {
    return "tcp4";
  }
  if (isIPv6(address)) {
    return "tcp6";
  }
  throw new HostEndpointsError(HostEndpointsErrorKind.ConfigMissing,
    `service network ${serviceNetwork[0]} is not a valid CIDR`);
}

/**
 * First InternalIP of the node in the family of the cluster's first service network
 */
export function getPreferredInternalIPAddressForNode(network: NetworkConfig, node: V1Node): { ip: string, family: IPFamily } {
  let family = getPreferredIPFamily(network);
  let matches = family === "tcp4" ? isIPv4 : isIPv6;
  let ip = getInternalIPs(node).find(address => matches(address));
  if (!ip) {
    throw new HostEndpointsError(HostEndpointsErrorKind.TopologyIncomplete,
      `unable to determine internal ip address for node ${node.metadata?.name}: no matches found for ip family ${family}`);
  }
  return { ip, family };
}
