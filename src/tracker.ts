// src/tracker.ts — Per-unit progress tracking

import type { TrackedObjectState } from "./types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export type StateCounts = Record<TrackedObjectState, number>;

export interface ProgressTracker {
  track(file: string, unitId: string, state: TrackedObjectState): void;
  states(file: string): ReadonlyMap<string, TrackedObjectState>;
  counts(file?: string): StateCounts;
  reset(file: string): void;
}

function emptyCounts(): StateCounts {
  return { pending: 0, processed: 0, failed: 0, skipped: 0 };
}

/**
 * Keeps the latest state of every unit, keyed by file. Logs a progress
 * line whenever a unit reaches a final state.
 */
export class DefaultProgressTracker implements ProgressTracker {
  private readonly files = new Map<string, Map<string, TrackedObjectState>>();

  constructor(private readonly logger: Logger = silentLogger) {}

  track(file: string, unitId: string, state: TrackedObjectState): void {
    let units = this.files.get(file);
    if (!units) {
      units = new Map();
      this.files.set(file, units);
    }
    const previous = units.get(unitId);
    units.set(unitId, state);
    this.logger.debug(`${file}: ${unitId} ${previous ?? "new"} -> ${state}`);

    if (state === "processed" || state === "failed") {
      const { processed, failed, skipped } = this.counts(file);
      const done = processed + failed;
      const total = units.size - skipped;
      this.logger.info(`[${done}/${total}] ${file}: ${unitId} ${state}`);
    }
  }

  states(file: string): ReadonlyMap<string, TrackedObjectState> {
    return this.files.get(file) ?? new Map();
  }

  counts(file?: string): StateCounts {
    const counts = emptyCounts();
    const maps = file === undefined ? [...this.files.values()] : [this.states(file)];
    for (const units of maps) {
      for (const state of units.values()) counts[state]++;
    }
    return counts;
  }

  reset(file: string): void {
    this.files.delete(file);
  }

  summary(): string {
    const c = this.counts();
    return `${c.processed} documented, ${c.failed} failed, ${c.skipped} skipped, ${c.pending} pending`;
  }
}
