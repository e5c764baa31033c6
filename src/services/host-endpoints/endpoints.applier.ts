import { V1Endpoints } from "@kubernetes/client-node";
import * as yaml from "yaml";
import { HostEndpointsError, HostEndpointsErrorKind, errorMessage } from "../../errors/host-endpoints.error";
import { Logger } from "../../helpers/logger";
import { ApplyResult } from "../../models/host-endpoints.model";
import { EndpointsStore } from "../kube/endpoints.store";
import { EventRecorder } from "../kube/event.recorder";
import { reconcileNeeded } from "./endpoints.diff";

export class EndpointsApplier {

  private readonly logger = new Logger("endpoints-applier");

  constructor(private readonly store: EndpointsStore, private readonly recorder: EventRecorder) {
  }

  /**
   * Writes `required` when it differs from the stored object. An object that
   * has disappeared is created again, the attempt still fails so the caller
   * reports it and retries.
   */
  public async apply(required: V1Endpoints): Promise<ApplyResult> {
    let namespace = required.metadata?.namespace || "";
    let name = required.metadata?.name || "";
    let ref = `endpoints/${name} -n ${namespace}`;

    let existing = await this.store.get(namespace, name);
    if (!existing) {
      try {
        await this.store.create(required);
      } catch (e) {
        this.recorder.warning("EndpointsCreateFailed", `Failed to create ${ref}: ${errorMessage(e)}`);
        throw e;
      }
      this.recorder.warning("EndpointsCreated", `Created ${ref} because it was missing`);
      throw new HostEndpointsError(HostEndpointsErrorKind.EndpointsMissing, `${ref} was missing and has been recreated`);
    }

    let { toWrite, changed, changes } = reconcileNeeded(existing, required);
    if (!changed) {
      this.logger.debug(`${ref} is up to date`);
      return ApplyResult.UNCHANGED;
    }

    this.logger.debug(`${ref} changes: ${changes.join("; ")}`);
    let updated: V1Endpoints;
    try {
      updated = await this.store.update(toWrite);
    } catch (e) {
      this.recorder.warning("EndpointsUpdateFailed", `Failed to update ${ref}: ${errorMessage(e)}`);
      throw e;
    }

    this.logger.info(`toWrite: \n${yaml.stringify(updated.subsets || [])}`);
    this.recorder.event("EndpointsUpdated", `Updated ${ref} because it changed: ${changes.join("; ")}`);
    return ApplyResult.UPDATED;
  }

}
