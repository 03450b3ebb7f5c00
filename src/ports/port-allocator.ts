import type { LabState } from "../state/types.js";

export interface PortRange {
  start: number;
  end: number;
}

/** Inclusive host-port window that direct-mapped (TCP/UDP) ports are drawn from. */
export const DEFAULT_PORT_RANGE: PortRange = { start: 40000, end: 49999 };

/**
 * Pick `count` host ports from `range` (inclusive) that are not in `used`.
 * First-fit ascending, so the same inputs always give the same ports.
 * Throws rather than returning fewer than requested.
 */
export function allocatePorts(used: Iterable<number>, count: number, range: PortRange = DEFAULT_PORT_RANGE): number[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Port count must be a non-negative integer (got ${count})`);
  }
  const taken = new Set(used);
  const ports: number[] = [];
  for (let port = range.start; port <= range.end && ports.length < count; port++) {
    if (!taken.has(port)) ports.push(port);
  }
  if (ports.length < count) {
    throw new PortCapacityError(count, ports.length, range);
  }
  return ports;
}

/**
 * Every host port currently recorded against an instance. `exclude` skips one
 * app, whose previous allocation is about to be replaced.
 */
export function usedHostPorts(state: LabState, exclude?: string): Set<number> {
  const used = new Set<number>();
  for (const [name, app] of Object.entries(state.apps)) {
    if (name === exclude) continue;
    for (const p of app.ports) used.add(p.hostPort);
  }
  return used;
}

export class PortCapacityError extends Error {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number, range: PortRange) {
    super(
      `Port range ${range.start}-${range.end} exhausted: requested ${requested} host port(s), only ${available} available`,
    );
    this.name = "PortCapacityError";
    this.requested = requested;
    this.available = available;
  }
}
