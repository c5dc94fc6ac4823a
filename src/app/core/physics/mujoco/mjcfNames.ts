import type { WarningSink } from "../../services/logger";

/**
 * Tracks names already taken in one MJCF namespace (actuators, plugins, ...).
 * `claim` never hands out a name twice.
 */
export class NameRegistry {
  private used = new Set<string>();
  private counters = new Map<string, number>();
  private warn?: WarningSink;
  private label: string;

  constructor(existing: Iterable<string> = [], warn?: WarningSink, label = "name") {
    for (const name of existing) {
      if (name) this.used.add(name);
    }
    this.warn = warn;
    this.label = label;
  }

  /** `preferred` when free, else `alternate`, else `alternate_N` with the first free N. */
  claim(preferred: string, alternate = preferred): string {
    if (!this.used.has(preferred)) {
      this.used.add(preferred);
      return preferred;
    }
    if (!this.used.has(alternate)) {
      this.used.add(alternate);
      return alternate;
    }

    let index = this.counters.get(alternate) ?? 1;
    let candidate = `${alternate}_${index}`;
    while (this.used.has(candidate)) {
      index += 1;
      candidate = `${alternate}_${index}`;
    }
    this.counters.set(alternate, index + 1);
    this.used.add(candidate);
    this.warn?.(`Duplicate ${this.label} '${preferred}' renamed to '${candidate}'.`);
    return candidate;
  }
}
