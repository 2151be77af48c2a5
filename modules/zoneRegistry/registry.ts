import { createLogger, errorDetails } from "@/lib/log";

import { ZoneRegistrySnapshot } from "./snapshot";

const log = createLogger("zone-registry");

/**
 * Holds the published snapshot. Readers call `current()` once per calculation and keep that
 * reference; `publish` swaps the reference in a single assignment.
 */
export class ZoneRegistry {
  private snapshot: ZoneRegistrySnapshot;
  private version = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(initial: ZoneRegistrySnapshot = ZoneRegistrySnapshot.empty()) {
    this.snapshot = initial;
  }

  current(): ZoneRegistrySnapshot {
    return this.snapshot;
  }

  currentVersion(): number {
    return this.version;
  }

  publish(next: ZoneRegistrySnapshot): void {
    this.snapshot = next;
    this.version += 1;
    log.info("snapshot_published", { version: this.version, source: next.source, ...next.stats() });
  }

  /**
   * Builds a new snapshot and publishes it. A failed build leaves the previous snapshot active
   * and rethrows. Refreshes run one at a time in call order, so the last call publishes last.
   */
  refresh(build: () => Promise<ZoneRegistrySnapshot> | ZoneRegistrySnapshot): Promise<ZoneRegistrySnapshot> {
    const run = this.pending.then(() => this.runRefresh(build));
    // A failure is reported to its own caller only.
    this.pending = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runRefresh(build: () => Promise<ZoneRegistrySnapshot> | ZoneRegistrySnapshot): Promise<ZoneRegistrySnapshot> {
    let next: ZoneRegistrySnapshot;
    try {
      next = await build();
    } catch (e) {
      log.error("refresh_failed", { version: this.version, ...errorDetails(e) });
      throw e;
    }
    this.publish(next);
    return next;
  }
}
