import { CoreV1Api } from "@kubernetes/client-node";
import { describeApiError } from "../../helpers/kube.helper";
import { Logger } from "../../helpers/logger";

export type EventType = "Normal" | "Warning";

/**
 * Sink for the events an operator publishes about the objects it manages
 */
export interface EventRecorder {

  event(reason: string, message: string): void;

  warning(reason: string, message: string): void;

}

export interface InvolvedObject {
  apiVersion: string;
  kind: string;
  namespace: string;
  name: string;
}

type CoreEvent = Parameters<CoreV1Api["createNamespacedEvent"]>[1];

/**
 * Posts core/v1 Events. Posting never fails the caller, errors are only logged.
 */
export class KubeEventRecorder implements EventRecorder {

  private readonly logger = new Logger("events");

  constructor(private readonly apiClient: Pick<CoreV1Api, "createNamespacedEvent">, private readonly involvedObject: InvolvedObject, private readonly component: string) {
  }

  public event(reason: string, message: string): void {
    this.record("Normal", reason, message);
  }

  public warning(reason: string, message: string): void {
    this.record("Warning", reason, message);
  }

  private record(type: EventType, reason: string, message: string): void {
    if (type === "Warning") {
      this.logger.warn(`${reason}: ${message}`);
    } else {
      this.logger.info(`${reason}: ${message}`);
    }

    let { namespace, name } = this.involvedObject;
    let now = new Date();
    let event: CoreEvent = {
      metadata: {
        generateName: `${name}.`,
        namespace: namespace
      },
      involvedObject: { ...this.involvedObject },
      type: type,
      reason: reason,
      message: message,
      source: {
        component: this.component
      },
      firstTimestamp: now,
      lastTimestamp: now,
      count: 1
    };

    this.apiClient.createNamespacedEvent(namespace, event).catch(e => {
      this.logger.error(describeApiError(`POST /api/v1/namespaces/${namespace}/events`, e));
    });
  }

}
