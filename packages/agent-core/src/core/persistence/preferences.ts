import { MemoryNamespace } from "../contracts";
import { namespaceKey } from "../preferences/namespace";

export interface PreferenceRecord {
  namespace: MemoryNamespace;
  profile: string;
  version: number;
  updatedAt: string;
}

export interface PreferenceWrite {
  namespace: MemoryNamespace;
  profile: string;
  /** Version read before the write; `undefined` when no record existed. */
  expectedVersion: number | undefined;
  updatedAt: string;
}

/**
 * Durable key-value medium for preference profiles. `write` is a compare-and-swap on
 * `expectedVersion` and resolves `false` when another writer got there first.
 */
export interface PreferencePersistencePort {
  read(namespace: MemoryNamespace): Promise<PreferenceRecord | undefined>;
  write(input: PreferenceWrite): Promise<boolean>;
  listNamespaces(): Promise<MemoryNamespace[]>;
}

export interface InMemoryPreferenceSnapshot {
  records: PreferenceRecord[];
}

export class InMemoryPreferencePersistence implements PreferencePersistencePort {
  private records = new Map<string, PreferenceRecord>();

  async read(namespace: MemoryNamespace): Promise<PreferenceRecord | undefined> {
    const record = this.records.get(namespaceKey(namespace));
    return record ? clone(record) : undefined;
  }

  async write(input: PreferenceWrite): Promise<boolean> {
    const key = namespaceKey(input.namespace);
    const existing = this.records.get(key);
    if (existing?.version !== input.expectedVersion) {
      return false;
    }

    this.records.set(key, {
      namespace: clone(input.namespace),
      profile: input.profile,
      version: (existing?.version ?? 0) + 1,
      updatedAt: input.updatedAt
    });
    return true;
  }

  async listNamespaces(): Promise<MemoryNamespace[]> {
    return Array.from(this.records.values())
      .map((record) => clone(record.namespace))
      .sort((a, b) => a.join(":").localeCompare(b.join(":")));
  }

  toSnapshot(): InMemoryPreferenceSnapshot {
    return {
      records: Array.from(this.records.values()).map(clone)
    };
  }

  static fromSnapshot(snapshot: InMemoryPreferenceSnapshot): InMemoryPreferencePersistence {
    const persistence = new InMemoryPreferencePersistence();
    persistence.records = new Map(
      snapshot.records.map((record) => [namespaceKey(record.namespace), clone(record)])
    );
    return persistence;
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
