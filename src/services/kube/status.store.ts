import { CustomObjectsApi } from "@kubernetes/client-node";
import deepEqual from "deep-equal";
import { HostEndpointsError, HostEndpointsErrorKind, isHostEndpointsError } from "../../errors/host-endpoints.error";
import { describeApiError, isConflict } from "../../helpers/kube.helper";
import { OperatorCondition, OperatorResourceSchema } from "../../models/openshift-config.model";

const MAX_ATTEMPTS = 5;

export interface StatusStore {

  updateCondition(condition: OperatorCondition): Promise<void>;

}

export type OperatorStatusApi = Pick<CustomObjectsApi, "getClusterCustomObject" | "replaceClusterCustomObjectStatus">;

export interface OperatorResourceRef {
  group: string;
  version: string;
  plural: string;
  name: string;
}

/**
 * Sets a condition on the list. The transition time only moves when the
 * status of an existing condition changes.
 */
export function setOperatorCondition(conditions: OperatorCondition[], condition: OperatorCondition, now: Date): OperatorCondition[] {
  let existing = conditions.find(c => c.type === condition.type);
  if (!existing) {
    return [...conditions, { ...condition, lastTransitionTime: now.toISOString() }];
  }
  let lastTransitionTime = existing.status === condition.status && existing.lastTransitionTime
    ? existing.lastTransitionTime
    : now.toISOString();
  return conditions.map(c => c === existing ? { ...condition, lastTransitionTime } : c);
}

/**
 * Writes conditions to the status subresource of the operator resource,
 * retrying when another writer got in between the read and the write.
 */
export class KubeOperatorStatusStore implements StatusStore {

  constructor(
    private readonly customObjectsApi: OperatorStatusApi,
    private readonly resource: OperatorResourceRef,
    private readonly clock: () => Date = () => new Date()
  ) {
  }

  public async updateCondition(condition: OperatorCondition): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await this.tryUpdateCondition(condition);
        return;
      } catch (e) {
        if (isHostEndpointsError(e)) {
          throw e;
        }
        if (isConflict(e) && attempt < MAX_ATTEMPTS) {
          continue;
        }
        throw new HostEndpointsError(HostEndpointsErrorKind.StatusWriteFailure,
          describeApiError(`PUT ${this.path}/status`, e), e);
      }
    }
  }

  private get path(): string {
    let { group, version, plural, name } = this.resource;
    return `/apis/${group}/${version}/${plural}/${name}`;
  }

  private async tryUpdateCondition(condition: OperatorCondition): Promise<void> {
    let { group, version, plural, name } = this.resource;
    let res = await this.customObjectsApi.getClusterCustomObject(group, version, plural, name);
    let parsed = OperatorResourceSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new HostEndpointsError(HostEndpointsErrorKind.StatusWriteFailure,
        `${plural}.${group}/${name} is malformed: ${parsed.error.message}`, parsed.error);
    }

    let operator = parsed.data;
    let conditions = setOperatorCondition(operator.status.conditions, condition, this.clock());
    if (deepEqual(conditions, operator.status.conditions, { strict: true })) {
      return;
    }

    await this.customObjectsApi.replaceClusterCustomObjectStatus(group, version, plural, name, {
      ...operator,
      status: { ...operator.status, conditions }
    });
  }

}
