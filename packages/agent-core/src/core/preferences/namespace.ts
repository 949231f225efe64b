import { MemoryNamespace } from "../contracts";
import { ValidationRuntimeError } from "../errors";

const SEPARATOR = ":";

export function assertNamespace(namespace: readonly string[]): asserts namespace is MemoryNamespace {
  if (!Array.isArray(namespace) || namespace.length === 0) {
    throw new ValidationRuntimeError("Invalid memory namespace: at least one segment is required");
  }
  for (const segment of namespace) {
    if (typeof segment !== "string" || segment.length === 0) {
      throw new ValidationRuntimeError("Invalid memory namespace: segments must be non-empty strings");
    }
    if (segment.includes(SEPARATOR)) {
      throw new ValidationRuntimeError(
        `Invalid memory namespace segment "${segment}": "${SEPARATOR}" is reserved`
      );
    }
  }
}

export function namespaceKey(namespace: MemoryNamespace): string {
  assertNamespace(namespace);
  return namespace.join(SEPARATOR);
}

export function parseNamespaceKey(key: string): MemoryNamespace {
  const segments = key.split(SEPARATOR);
  assertNamespace(segments);
  return segments;
}
