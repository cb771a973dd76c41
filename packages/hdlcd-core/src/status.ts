// Latest port status reported on a control channel.

import type { PortStatus } from "@hdlcd/wire";

/** Port status as last seen; empty until the first report arrives. */
export type PortStatusSnapshot = Readonly<Partial<PortStatus>>;

const EMPTY: PortStatusSnapshot = Object.freeze({});

/** Value equality of two snapshots. */
export function portStatusEquals(a: PortStatusSnapshot, b: PortStatusSnapshot): boolean {
  return a.alive === b.alive && a.lockedByOthers === b.lockedByOthers && a.lockedByMe === b.lockedByMe;
}

/**
 * Holds the latest port status.
 *
 * Whoever reads the control channel is the only writer; it replaces the
 * frozen snapshot wholesale, so a reader never observes a half-updated status.
 */
export class PortStatusCache {
  private snapshot: PortStatusSnapshot = EMPTY;

  /** A copy of the latest snapshot. */
  get(): PortStatusSnapshot {
    return { ...this.snapshot };
  }

  /**
   * Record a new status.
   *
   * @returns whether it differs from the previous one
   */
  set(status: PortStatus): boolean {
    const next = Object.freeze({ ...status });
    const changed = !portStatusEquals(this.snapshot, next);
    this.snapshot = next;
    return changed;
  }
}
