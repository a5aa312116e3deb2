/**
 * Destination for secrets loaded by `loadEnv`
 */
export interface EnvironmentStore {
  set(key: string, value: string): void;
  get(key: string): string | undefined;
}

/**
 * Writes into `process.env`. Node propagates it to child processes, so
 * spawned commands and later lookups both see loaded secrets.
 */
export class ProcessEnvironmentStore implements EnvironmentStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  set(key: string, value: string): void {
    this.env[key] = value;
  }

  get(key: string): string | undefined {
    return this.env[key];
  }
}

/**
 * Map-backed store for tests and for callers that want the values without
 * touching process state
 */
export class InMemoryEnvironmentStore implements EnvironmentStore {
  private readonly values = new Map<string, string>();

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  clear(): void {
    this.values.clear();
  }
}
