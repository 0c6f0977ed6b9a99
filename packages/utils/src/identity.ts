/**
 * Identifies one concurrent stress run among all those a session starts
 * against the same cluster.
 */
export interface InvocationIdentity {
  readonly loaderIndex: number;
  readonly cpuIndex: number;
  readonly keyspaceIndex: number;
}

export function createIdentity(loaderIndex: number, cpuIndex: number, keyspaceIndex: number): InvocationIdentity {
  return Object.freeze({ loaderIndex, cpuIndex, keyspaceIndex });
}

/** Deterministic id used in log file names, e.g. `l0-c1-k2`. */
export function logFileId(identity: InvocationIdentity): string {
  return `l${identity.loaderIndex}-c${identity.cpuIndex}-k${identity.keyspaceIndex}`;
}

/** Tag echoed into the remote shell so a process can be traced back to its run. */
export function shellTag(identity: InvocationIdentity): string {
  return `TAG: loader_idx:${identity.loaderIndex}-cpu_idx:${identity.cpuIndex}-keyspace_idx:${identity.keyspaceIndex}`;
}
