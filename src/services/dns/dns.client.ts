import { promises as dns, SrvRecord } from "dns";

export interface DnsClient {

  resolveSrv(name: string): Promise<SrvRecord[]>;

  /** All A and AAAA addresses of a host, as the system resolver returns them. */
  lookupHost(host: string): Promise<string[]>;

}

export class SystemDnsClient implements DnsClient {

  public resolveSrv(name: string): Promise<SrvRecord[]> {
    return dns.resolveSrv(name);
  }

  public async lookupHost(host: string): Promise<string[]> {
    let addresses = await dns.lookup(host, { all: true });
    return addresses.map(address => address.address);
  }

}
