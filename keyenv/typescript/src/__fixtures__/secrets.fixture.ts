import type { EnvironmentWire, SecretWire, SecretWithValueWire } from '../types/index.js';

/**
 * Mock factory for a secret as the API sends it, without value
 */
export function mockSecretWire(overrides?: Partial<SecretWire>): SecretWire {
  return {
    id: 'sec_123',
    environment_id: 'env_456',
    key: 'DATABASE_URL',
    type: 'string',
    version: 1,
    description: 'Database connection URL',
    created_at: '2024-01-01T00:00:00Z',
    updated_at: '2024-01-02T00:00:00Z',
    ...overrides,
  };
}

/**
 * Mock factory for an exported secret with its value
 */
export function mockSecretWithValueWire(overrides?: Partial<SecretWithValueWire>): SecretWithValueWire {
  return {
    ...mockSecretWire(),
    value: 'postgres://localhost/mydb',
    ...overrides,
  };
}

/**
 * Mock factory for an environment as the API sends it
 */
export function mockEnvironmentWire(overrides?: Partial<EnvironmentWire>): EnvironmentWire {
  return {
    id: 'env_123',
    project_id: 'proj_456',
    name: 'production',
    inherits_from: 'staging',
    created_at: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

/**
 * Export payload with one entry per key/value pair, in order
 */
export function mockExportResponse(pairs: Array<[string, string]>): { secrets: SecretWithValueWire[] } {
  return {
    secrets: pairs.map(([key, value], index) =>
      mockSecretWithValueWire({ id: `sec_${index + 1}`, key, value })
    ),
  };
}
