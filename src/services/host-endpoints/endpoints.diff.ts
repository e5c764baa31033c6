import { V1EndpointAddress, V1EndpointSubset, V1Endpoints, V1ObjectMeta } from "@kubernetes/client-node";
import deepEqual from "deep-equal";

export interface ReconcileResult {
  /** Copy of the existing object with the required metadata and subsets applied */
  toWrite: V1Endpoints;
  changed: boolean;
  /** Human readable description of every difference, empty when unchanged */
  changes: string[];
}

/**
 * Decides whether the existing object has to be written to match the required one.
 * Metadata is merged additively, subsets are replaced wholesale when they differ.
 */
export function reconcileNeeded(existing: V1Endpoints, required: V1Endpoints): ReconcileResult {
  let toWrite = structuredClone(existing);
  toWrite.metadata = toWrite.metadata || {};
  let changes = ensureObjectMeta(toWrite.metadata, required.metadata || {});

  let existingSubsets = existing.subsets || [];
  let requiredSubsets = required.subsets || [];
  if (!endpointSubsetsEqual(existingSubsets, requiredSubsets)) {
    toWrite.subsets = structuredClone(requiredSubsets);
    changes.push(...describeAddressChanges(existingSubsets, requiredSubsets));
  }

  return {
    toWrite,
    changed: changes.length > 0,
    changes
  };
}

/**
 * Applies name, namespace, labels and annotations of `required` onto `target`.
 * Keys not present in `required` are left untouched.
 */
export function ensureObjectMeta(target: V1ObjectMeta, required: V1ObjectMeta): string[] {
  let changes: string[] = [];
  if (required.name && target.name !== required.name) {
    changes.push(`name: ${quote(target.name)} -> ${quote(required.name)}`);
    target.name = required.name;
  }
  if (required.namespace && target.namespace !== required.namespace) {
    changes.push(`namespace: ${quote(target.namespace)} -> ${quote(required.namespace)}`);
    target.namespace = required.namespace;
  }
  if (required.labels) {
    target.labels = target.labels || {};
    changes.push(...mergeMap("labels", target.labels, required.labels));
  }
  if (required.annotations) {
    target.annotations = target.annotations || {};
    changes.push(...mergeMap("annotations", target.annotations, required.annotations));
  }
  return changes;
}

function mergeMap(field: string, target: { [key: string]: string }, required: { [key: string]: string }): string[] {
  let changes: string[] = [];
  for (let key of Object.keys(required)) {
    if (target[key] !== required[key]) {
      changes.push(`${field}[${key}]: ${quote(target[key])} -> ${quote(required[key])}`);
      target[key] = required[key];
    }
  }
  return changes;
}

export function endpointSubsetsEqual(lhs: V1EndpointSubset[], rhs: V1EndpointSubset[]): boolean {
  if (lhs.length !== rhs.length) {
    return false;
  }
  return lhs.every((subset, i) => endpointSubsetEqual(subset, rhs[i]));
}

/**
 * Two subsets are equal when their counts match and their addresses are the
 * same regardless of order. Ports are compared by count only.
 */
export function endpointSubsetEqual(lhs: V1EndpointSubset, rhs: V1EndpointSubset): boolean {
  let lhsAddresses = lhs.addresses || [];
  let rhsAddresses = rhs.addresses || [];
  if (lhsAddresses.length !== rhsAddresses.length) {
    return false;
  }
  if ((lhs.notReadyAddresses || []).length !== (rhs.notReadyAddresses || []).length) {
    return false;
  }
  if ((lhs.ports || []).length !== (rhs.ports || []).length) {
    return false;
  }
  return deepEqual(sortedAddresses(lhsAddresses), sortedAddresses(rhsAddresses), { strict: true });
}

export function compareEndpointAddresses(a: V1EndpointAddress, b: V1EndpointAddress): number {
  return compareStrings(a.ip, b.ip)
    || compareStrings(a.hostname || "", b.hostname || "")
    || compareStrings(a.nodeName || "", b.nodeName || "");
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// The api client fills every known field, absent ones as undefined
function sortedAddresses(addresses: V1EndpointAddress[]): V1EndpointAddress[] {
  return addresses.map(address => withoutUndefined(address)).sort(compareEndpointAddresses);
}

function describeAddressChanges(existing: V1EndpointSubset[], required: V1EndpointSubset[]): string[] {
  let before = new Set(existing.flatMap(subset => subset.addresses || []).map(describeAddress));
  let after = new Set(required.flatMap(subset => subset.addresses || []).map(describeAddress));
  let added = [...after].filter(address => !before.has(address)).sort();
  let removed = [...before].filter(address => !after.has(address)).sort();

  let changes: string[] = [];
  if (added.length > 0) {
    changes.push(`added addresses: ${added.join(", ")}`);
  }
  if (removed.length > 0) {
    changes.push(`removed addresses: ${removed.join(", ")}`);
  }
  if (changes.length === 0) {
    changes.push("subsets changed");
  }
  return changes;
}

export function describeAddress(address: V1EndpointAddress): string {
  let details = [address.hostname, address.nodeName && `node ${address.nodeName}`].filter(Boolean);
  return details.length > 0 ? `${address.ip} (${details.join(", ")})` : address.ip;
}

function quote(value?: string): string {
  return value === undefined ? "<unset>" : JSON.stringify(value);
}

function withoutUndefined<T>(value: T): T {
  return JSON.parse(JSON.stringify(value));
}
