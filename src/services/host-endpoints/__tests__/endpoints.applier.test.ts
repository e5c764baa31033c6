import { describe, it, expect, beforeEach } from "vitest";
import { V1Endpoints } from "@kubernetes/client-node";
import { HostEndpointsError, HostEndpointsErrorKind } from "../../../errors/host-endpoints.error";
import { InMemoryEndpointsStore, RecordingEventRecorder, endpoints, rejectionOf } from "../../../__tests__/fakes";
import { ApplyResult } from "../../../models/host-endpoints.model";
import { EndpointsApplier } from "../endpoints.applier";

const etcd0 = { ip: "10.0.0.1", hostname: "etcd-0", nodeName: "master-0" };
const etcd1 = { ip: "10.0.0.2", hostname: "etcd-1", nodeName: "master-1" };
const etcd2 = { ip: "10.0.0.3", hostname: "etcd-2", nodeName: "master-2" };

describe("EndpointsApplier", () => {
  let store: InMemoryEndpointsStore;
  let recorder: RecordingEventRecorder;
  let applier: EndpointsApplier;
  let required: V1Endpoints;

  beforeEach(() => {
    store = new InMemoryEndpointsStore();
    recorder = new RecordingEventRecorder();
    applier = new EndpointsApplier(store, recorder);
    required = endpoints([etcd0, etcd1, etcd2]);
  });

  it("does not write an object that is up to date", async () => {
    store.seed(endpoints([etcd2, etcd1, etcd0]));

    expect(await applier.apply(required)).toBe(ApplyResult.UNCHANGED);
    expect(store.writes).toBe(0);
    expect(recorder.events).toEqual([]);
  });

  it("updates the object and records what changed", async () => {
    store.seed(endpoints([etcd0, etcd1]));

    expect(await applier.apply(required)).toBe(ApplyResult.UPDATED);

    expect(store.updates).toBe(1);
    expect(store.peek()?.subsets).toEqual(required.subsets);
    expect(store.peek()?.metadata?.resourceVersion).toBe("2");
    expect(recorder.events).toEqual([{
      type: "Normal",
      reason: "EndpointsUpdated",
      message: "Updated endpoints/host-etcd -n openshift-etcd because it changed: added addresses: 10.0.0.3 (etcd-2, node master-2)"
    }]);
  });

  it("keeps metadata it does not manage", async () => {
    let existing = endpoints([etcd0]);
    existing.metadata = { ...existing.metadata, labels: { "app": "etcd" } };
    store.seed(existing);

    await applier.apply(required);

    expect(store.peek()?.metadata?.labels).toEqual({ "app": "etcd" });
  });

  it("recreates a missing object and still fails the attempt", async () => {
    let error = await rejectionOf(applier.apply(required));

    expect(error.kind).toBe(HostEndpointsErrorKind.EndpointsMissing);
    expect(error.message).toBe("endpoints/host-etcd -n openshift-etcd was missing and has been recreated");
    expect(store.creates).toBe(1);
    expect(store.peek()?.subsets).toEqual(required.subsets);
    expect(recorder.events).toEqual([{
      type: "Warning",
      reason: "EndpointsCreated",
      message: "Created endpoints/host-etcd -n openshift-etcd because it was missing"
    }]);
  });

  it("records a failed create", async () => {
    store.failNextWrite = new HostEndpointsError(HostEndpointsErrorKind.StoreWriteFailure, "forbidden");

    let error = await rejectionOf(applier.apply(required));

    expect(error.kind).toBe(HostEndpointsErrorKind.StoreWriteFailure);
    expect(recorder.reasons()).toEqual(["EndpointsCreateFailed"]);
  });

  it("surfaces a failed update without retrying", async () => {
    store.seed(endpoints([etcd0]));
    let failure = new HostEndpointsError(HostEndpointsErrorKind.Conflict, "the object has been modified");
    store.failNextWrite = failure;

    let error = await rejectionOf(applier.apply(required));

    expect(error).toBe(failure);
    expect(store.updates).toBe(0);
    expect(recorder.events).toEqual([{
      type: "Warning",
      reason: "EndpointsUpdateFailed",
      message: "Failed to update endpoints/host-etcd -n openshift-etcd: the object has been modified"
    }]);
  });
});
