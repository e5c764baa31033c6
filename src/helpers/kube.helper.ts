import { HttpError, V1Node } from "@kubernetes/client-node";

export function isNotFound(e: unknown): boolean {
  return e instanceof HttpError && e.statusCode === 404;
}

export function isConflict(e: unknown): boolean {
  return e instanceof HttpError && e.statusCode === 409;
}

/**
 * Short description of a failed api call, e.g. `GET /api/v1/... failed (403) forbidden`
 */
export function describeApiError(request: string, e: unknown): string {
  if (e instanceof HttpError) {
    let body: unknown = e.body;
    let message = typeof body === "object" && body !== null && "message" in body && typeof body.message === "string"
      ? body.message
      : e.message;
    return `${request} failed (${e.statusCode}) ${message}`;
  }
  return `${request} failed: ${e instanceof Error ? e.message : String(e)}`;
}

export function getInternalIPs(node: V1Node): string[] {
  return (node.status?.addresses || [])
    .filter(address => address.type === "InternalIP")
    .map(address => address.address);
}
