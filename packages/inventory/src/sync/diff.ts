export type DiffEntry =
  | { kind: "unchanged"; key: string; value: string }
  | { kind: "new"; key: string; value: string }
  | { kind: "changed"; key: string; previous: string; value: string };

export interface ChangedValue {
  previous: string;
  value: string;
}

export interface KeyValueDiff {
  unchanged: ReadonlyMap<string, string>;
  new: ReadonlyMap<string, string>;
  changed: ReadonlyMap<string, ChangedValue>;
}

/**
 * Classifies every local key against the remote map. Keys that only exist
 * remotely are not reported.
 */
export function diffKeyValues(
  local: ReadonlyMap<string, string>,
  remote: ReadonlyMap<string, string>
): DiffEntry[] {
  const entries: DiffEntry[] = [];

  for (const [key, value] of local) {
    const previous = remote.get(key);

    if (previous === undefined) {
      entries.push({ kind: "new", key, value });
    } else if (previous === value) {
      entries.push({ kind: "unchanged", key, value });
    } else {
      entries.push({ kind: "changed", key, previous, value });
    }
  }

  return entries;
}

export function groupDiff(entries: readonly DiffEntry[]): KeyValueDiff {
  const unchanged = new Map<string, string>();
  const added = new Map<string, string>();
  const changed = new Map<string, ChangedValue>();

  for (const entry of entries) {
    switch (entry.kind) {
      case "unchanged":
        unchanged.set(entry.key, entry.value);
        break;
      case "new":
        added.set(entry.key, entry.value);
        break;
      case "changed":
        changed.set(entry.key, { previous: entry.previous, value: entry.value });
        break;
    }
  }

  return { unchanged, new: added, changed };
}

export function diff(
  local: ReadonlyMap<string, string>,
  remote: ReadonlyMap<string, string>
): KeyValueDiff {
  return groupDiff(diffKeyValues(local, remote));
}

export function hasPendingChanges(result: KeyValueDiff): boolean {
  return result.new.size > 0 || result.changed.size > 0;
}

/** The writes an apply step performs: new values and the new side of changes. */
export function pendingWrites(result: KeyValueDiff): Map<string, string> {
  const writes = new Map(result.new);

  for (const [key, change] of result.changed) {
    writes.set(key, change.value);
  }

  return writes;
}
