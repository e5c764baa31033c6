import { HostEndpointsError, HostEndpointsErrorKind, errorMessage } from "../../errors/host-endpoints.error";
import { Logger } from "../../helpers/logger";
import { DEGRADED_CONDITION } from "../../models/host-endpoints.model";
import { EventRecorder } from "../kube/event.recorder";
import { StatusStore } from "../kube/status.store";

/**
 * Turns the outcome of a reconcile into the HostEndpointsDegraded condition
 */
export class StatusReporter {

  private readonly logger = new Logger("status-reporter");

  constructor(private readonly statusStore: StatusStore, private readonly recorder: EventRecorder) {
  }

  /**
   * Rethrows `error` when one is given, whether or not the status could be written
   */
  public async reportOutcome(error?: unknown): Promise<void> {
    if (error !== undefined) {
      try {
        await this.statusStore.updateCondition({
          type: DEGRADED_CONDITION,
          status: "True",
          reason: "ErrorUpdatingHostEndpoints",
          message: errorMessage(error)
        });
      } catch (updateErr) {
        this.logger.error("Failed to report degraded status", updateErr);
        this.recorder.warning("HostEndpointsErrorUpdatingStatus", errorMessage(updateErr));
      }
      throw error;
    }

    try {
      await this.statusStore.updateCondition({
        type: DEGRADED_CONDITION,
        status: "False",
        reason: "HostEndpointsUpdated"
      });
    } catch (updateErr) {
      this.recorder.warning("HostEndpointsErrorUpdatingStatus", errorMessage(updateErr));
      if (updateErr instanceof HostEndpointsError) {
        throw updateErr;
      }
      throw new HostEndpointsError(HostEndpointsErrorKind.StatusWriteFailure, errorMessage(updateErr), updateErr);
    }
  }

}
