
export enum HostEndpointsErrorKind {
  ConfigMissing = "ConfigMissing",
  TopologyIncomplete = "TopologyIncomplete",
  DNSResolutionFailure = "DNSResolutionFailure",
  SelfNotFound = "SelfNotFound",
  NoReadyMembers = "NoReadyMembers",
  EndpointsMissing = "EndpointsMissing",
  StoreReadFailure = "StoreReadFailure",
  StoreWriteFailure = "StoreWriteFailure",
  StatusWriteFailure = "StatusWriteFailure",
  Conflict = "Conflict"
}

/**
 * Error raised by a reconcile attempt. Every kind is retried by the work queue.
 */
export class HostEndpointsError extends Error {

  constructor(public readonly kind: HostEndpointsErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HostEndpointsError";
    Object.setPrototypeOf(this, HostEndpointsError.prototype);
  }

  public toString(): string {
    return `${this.kind}: ${this.message}`;
  }

}

export function isHostEndpointsError(e: unknown, kind?: HostEndpointsErrorKind): e is HostEndpointsError {
  return e instanceof HostEndpointsError && (kind === undefined || e.kind === kind);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
