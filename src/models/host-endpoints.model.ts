import type { V1EndpointSubset } from "@kubernetes/client-node";

/** Hostname of the temporary member added while the cluster bootstraps. */
export const BOOTSTRAP_HOSTNAME = "etcd-bootstrap";

export const DNS_SUFFIX_ANNOTATION = "alpha.installer.openshift.io/dns-suffix";

export const DEGRADED_CONDITION = "HostEndpointsDegraded";

export type EndpointPort = NonNullable<V1EndpointSubset["ports"]>[number];

export enum ApplyResult {
  UNCHANGED = "UNCHANGED",
  UPDATED = "UPDATED"
}

/**
 * Outcome of the last reconcile, read by the metrics endpoint
 */
export interface HostEndpointsState {
  degraded: boolean;
  addresses: number;
  successfulSyncs: number;
  failedSyncs: number;
  lastError?: string;
}
