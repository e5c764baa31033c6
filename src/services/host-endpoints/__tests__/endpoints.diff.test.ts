import { describe, it, expect } from "vitest";
import { V1EndpointAddress } from "@kubernetes/client-node";
import { endpoints } from "../../../__tests__/fakes";
import { DNS_SUFFIX_ANNOTATION } from "../../../models/host-endpoints.model";
import { compareEndpointAddresses, endpointSubsetEqual, reconcileNeeded } from "../endpoints.diff";

const etcd0: V1EndpointAddress = { ip: "10.0.0.1", hostname: "etcd-0", nodeName: "master-0" };
const etcd1: V1EndpointAddress = { ip: "10.0.0.2", hostname: "etcd-1", nodeName: "master-1" };
const etcd2: V1EndpointAddress = { ip: "10.0.0.3", hostname: "etcd-2", nodeName: "master-2" };

describe("reconcileNeeded", () => {
  it("reports no change for the same addresses in another order", () => {
    let result = reconcileNeeded(endpoints([etcd0, etcd1, etcd2]), endpoints([etcd2, etcd0, etcd1]));

    expect(result.changed).toBe(false);
    expect(result.changes).toEqual([]);
  });

  it("ignores fields left undefined by the api client", () => {
    let existing = endpoints([{ ...etcd0, targetRef: undefined }]);

    expect(reconcileNeeded(existing, endpoints([etcd0])).changed).toBe(false);
  });

  it("replaces the subsets when an address is added", () => {
    let required = endpoints([etcd0, etcd1, etcd2]);

    let result = reconcileNeeded(endpoints([etcd0, etcd1]), required);

    expect(result.changed).toBe(true);
    expect(result.toWrite.subsets).toEqual(required.subsets);
    expect(result.changes).toEqual(["added addresses: 10.0.0.3 (etcd-2, node master-2)"]);
  });

  it("describes removed and replaced addresses", () => {
    let moved = { ...etcd1, ip: "10.0.0.12" };

    let result = reconcileNeeded(endpoints([etcd0, etcd1, etcd2]), endpoints([etcd0, moved]));

    expect(result.changes).toEqual([
      "added addresses: 10.0.0.12 (etcd-1, node master-1)",
      "removed addresses: 10.0.0.2 (etcd-1, node master-1), 10.0.0.3 (etcd-2, node master-2)"
    ]);
  });

  it("merges required annotations and keeps the others", () => {
    let existing = endpoints([etcd0]);
    existing.metadata = {
      ...existing.metadata,
      annotations: { [DNS_SUFFIX_ANNOTATION]: "old.example.com", "team": "etcd" }
    };
    let required = endpoints([etcd0]);
    required.metadata = { ...required.metadata, annotations: { [DNS_SUFFIX_ANNOTATION]: "example.com" } };

    let result = reconcileNeeded(existing, required);

    expect(result.changed).toBe(true);
    expect(result.toWrite.metadata?.annotations).toEqual({ [DNS_SUFFIX_ANNOTATION]: "example.com", "team": "etcd" });
    expect(result.changes).toEqual([`annotations[${DNS_SUFFIX_ANNOTATION}]: "old.example.com" -> "example.com"`]);
  });

  it("adds annotations to an object without any", () => {
    let required = endpoints([etcd0]);
    required.metadata = { ...required.metadata, annotations: { [DNS_SUFFIX_ANNOTATION]: "example.com" } };

    let result = reconcileNeeded(endpoints([etcd0]), required);

    expect(result.changes).toEqual([`annotations[${DNS_SUFFIX_ANNOTATION}]: <unset> -> "example.com"`]);
  });

  it("keeps the resource version and leaves the existing object untouched", () => {
    let existing = endpoints([etcd0]);
    existing.metadata = { ...existing.metadata, resourceVersion: "42" };

    let result = reconcileNeeded(existing, endpoints([etcd1]));

    expect(result.toWrite.metadata?.resourceVersion).toBe("42");
    expect(existing.subsets?.[0].addresses).toEqual([etcd0]);
  });
});

describe("endpointSubsetEqual", () => {
  it("compares not ready addresses by count", () => {
    let lhs = { addresses: [etcd0], notReadyAddresses: [etcd1] };

    expect(endpointSubsetEqual(lhs, { addresses: [etcd0], notReadyAddresses: [etcd2] })).toBe(true);
    expect(endpointSubsetEqual(lhs, { addresses: [etcd0] })).toBe(false);
  });

  it("compares ports by count", () => {
    expect(endpointSubsetEqual(
      { addresses: [etcd0], ports: [{ port: 2379 }] },
      { addresses: [etcd0], ports: [{ port: 2379 }, { port: 2380 }] }
    )).toBe(false);
  });

  it("sees a different hostname on the same ip", () => {
    expect(endpointSubsetEqual({ addresses: [etcd0] }, { addresses: [{ ...etcd0, hostname: "etcd-9" }] })).toBe(false);
  });
});

describe("compareEndpointAddresses", () => {
  it("orders by ip, hostname and node name", () => {
    let addresses: V1EndpointAddress[] = [
      { ip: "10.0.0.2", hostname: "b" },
      { ip: "10.0.0.1", hostname: "b", nodeName: "n2" },
      { ip: "10.0.0.1", hostname: "b", nodeName: "n1" },
      { ip: "10.0.0.1", hostname: "a" }
    ];

    expect(addresses.sort(compareEndpointAddresses)).toEqual([
      { ip: "10.0.0.1", hostname: "a" },
      { ip: "10.0.0.1", hostname: "b", nodeName: "n1" },
      { ip: "10.0.0.1", hostname: "b", nodeName: "n2" },
      { ip: "10.0.0.2", hostname: "b" }
    ]);
  });
});
