import type { SrvRecord } from "dns";
import { HostEndpointsError, HostEndpointsErrorKind, errorMessage } from "../../errors/host-endpoints.error";
import { Logger } from "../../helpers/logger";
import { DnsClient } from "./dns.client";

export interface MemberIdentityOptions {
  service: string;
  proto: string;
}

/**
 * Finds the etcd member name of a node by matching the targets of the
 * `_<service>._<proto>.<domain>` SRV records against the node's IP.
 */
export class MemberIdentityResolver {

  private readonly logger = new Logger("member-identity-resolver");

  constructor(private readonly dnsClient: DnsClient, private readonly options: MemberIdentityOptions) {
  }

  /**
   * @returns the fully qualified SRV target resolving to `ip`, without leading or trailing dots
   */
  public async resolveMemberHostname(domain: string, ip: string): Promise<string> {
    let srvName = `_${this.options.service}._${this.options.proto}.${domain}`;
    let records: SrvRecord[];
    try {
      records = await this.dnsClient.resolveSrv(srvName);
    } catch (e) {
      throw new HostEndpointsError(HostEndpointsErrorKind.DNSResolutionFailure,
        `could not query SRV records for ${srvName}: ${errorMessage(e)}`, e);
    }

    let matches: string[] = [];
    for (let record of records) {
      this.logger.debug(`checking against ${record.name}`);
      let addresses: string[];
      try {
        addresses = await this.dnsClient.lookupHost(record.name);
      } catch (e) {
        throw new HostEndpointsError(HostEndpointsErrorKind.DNSResolutionFailure,
          `could not resolve member "${record.name}"`, e);
      }
      if (addresses.includes(ip)) {
        matches.push(trimDots(record.name));
      }
    }

    if (matches.length === 0) {
      throw new HostEndpointsError(HostEndpointsErrorKind.SelfNotFound, "could not find self");
    }

    let candidates = [...new Set(matches)].sort();
    if (candidates.length > 1) {
      this.logger.warn(`${ip} is the target of several ${srvName} records (${candidates.join(", ")}), using ${candidates[0]}`);
    }
    return candidates[0];
  }

}

export function trimDots(name: string): string {
  return name.replace(/^\.+|\.+$/g, "");
}

/**
 * `etcd-0.example.com` in domain `example.com` becomes `etcd-0`
 */
export function shortHostname(name: string, domain: string): string {
  let suffix = "." + domain;
  return name.endsWith(suffix) ? name.slice(0, -suffix.length) : name;
}
