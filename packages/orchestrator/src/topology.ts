/**
 * Where the cluster's datacenters live. Only consulted for multi-region
 * sessions, to point each loader at the datacenter in its own region.
 */
export interface ClusterTopology {
  /** Region name -> datacenter name as the cluster reports it. */
  datacenterNamePerRegion(): Promise<Record<string, string>>;
}

export class StaticTopology implements ClusterTopology {
  constructor(private readonly datacenters: Readonly<Record<string, string>>) {}

  async datacenterNamePerRegion(): Promise<Record<string, string>> {
    return { ...this.datacenters };
  }
}
