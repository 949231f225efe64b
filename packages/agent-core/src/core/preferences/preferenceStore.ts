import { silentLogger, toErrorMessage } from "@mailgate/observability";
import type { StructuredLogger } from "@mailgate/observability";
import {
  DecisionSynthesizer,
  FeedbackMessage,
  MemoryNamespace,
  PreferenceNamespaceConfig
} from "../contracts";
import {
  PreferenceConflictError,
  PreferenceStoreUnavailableError,
  PreferenceSynthesisError,
  RuntimeError
} from "../errors";
import { PreferencePersistencePort, PreferenceRecord } from "../persistence/preferences";
import { KeyedMutex } from "./keyedMutex";
import { namespaceKey } from "./namespace";

const DEFAULT_MAX_WRITE_ATTEMPTS = 3;

export interface PreferenceStoreOptions {
  persistence: PreferencePersistencePort;
  synthesizer: DecisionSynthesizer;
  /** Profiles `update` starts from when a namespace has nothing stored yet. */
  defaults?: PreferenceNamespaceConfig[];
  maxWriteAttempts?: number;
  logger?: StructuredLogger;
  now?: () => Date;
}

/**
 * Persistent, per-namespace preference memory. The synthesizer is the only way a
 * profile changes; there is no `set`.
 */
export class PreferenceStore {
  private readonly persistence: PreferencePersistencePort;
  private readonly synthesizer: DecisionSynthesizer;
  private readonly defaults = new Map<string, string>();
  private readonly maxWriteAttempts: number;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(options: PreferenceStoreOptions) {
    this.persistence = options.persistence;
    this.synthesizer = options.synthesizer;
    this.maxWriteAttempts = Math.max(1, options.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    for (const config of options.defaults ?? []) {
      this.defaults.set(namespaceKey(config.namespace), config.defaultProfile);
    }
  }

  async get(namespace: MemoryNamespace, defaultProfile: string): Promise<string> {
    const record = await this.read(namespace);
    return record ? record.profile : defaultProfile;
  }

  async update(namespace: MemoryNamespace, feedbackMessages: FeedbackMessage[]): Promise<string> {
    const key = namespaceKey(namespace);
    return this.mutex.runExclusive(key, async () => {
      for (let attempt = 1; attempt <= this.maxWriteAttempts; attempt += 1) {
        const current = await this.read(namespace);
        const currentProfile = current?.profile ?? this.defaults.get(key) ?? "";
        const nextProfile = await this.synthesize(namespace, currentProfile, feedbackMessages);

        const written = await this.write(namespace, nextProfile, current);
        if (written) {
          this.logger({
            event: "preferences_updated",
            namespace: key,
            attempt,
            profileLength: nextProfile.length
          });
          return nextProfile;
        }

        this.logger({ event: "preferences_write_conflict", namespace: key, attempt });
      }

      throw new PreferenceConflictError(key, this.maxWriteAttempts);
    });
  }

  async listNamespaces(): Promise<MemoryNamespace[]> {
    try {
      return await this.persistence.listNamespaces();
    } catch (error) {
      throw new PreferenceStoreUnavailableError("*", `Preference store list failed: ${toErrorMessage(error)}`);
    }
  }

  private async read(namespace: MemoryNamespace): Promise<PreferenceRecord | undefined> {
    try {
      return await this.persistence.read(namespace);
    } catch (error) {
      const key = namespaceKey(namespace);
      throw new PreferenceStoreUnavailableError(
        key,
        `Preference store read failed for ${key}: ${toErrorMessage(error)}`
      );
    }
  }

  private async write(
    namespace: MemoryNamespace,
    profile: string,
    current: PreferenceRecord | undefined
  ): Promise<boolean> {
    try {
      return await this.persistence.write({
        namespace,
        profile,
        expectedVersion: current?.version,
        updatedAt: this.now().toISOString()
      });
    } catch (error) {
      const key = namespaceKey(namespace);
      throw new PreferenceStoreUnavailableError(
        key,
        `Preference store write failed for ${key}: ${toErrorMessage(error)}`
      );
    }
  }

  private async synthesize(
    namespace: MemoryNamespace,
    currentProfile: string,
    feedbackMessages: FeedbackMessage[]
  ): Promise<string> {
    try {
      return await this.synthesizer.synthesize({ namespace, currentProfile, feedbackMessages });
    } catch (error) {
      if (error instanceof RuntimeError && error.code === "SYNTHESIZER_FAILURE") {
        throw error;
      }
      const key = namespaceKey(namespace);
      throw new PreferenceSynthesisError(
        key,
        `Preference synthesis failed for ${key}: ${toErrorMessage(error)}`
      );
    }
  }
}
