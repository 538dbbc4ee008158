/**
 * Raised by a NamespaceReader when the requested namespace does not exist.
 * Every other lookup failure is reported as-is.
 */
export class NamespaceNotFoundError extends Error {
  constructor(public readonly namespace: string, cause?: unknown) {
    super(`namespaces "${namespace}" not found`, { cause });
    this.name = "NamespaceNotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
