import { ConfigurationError } from '../errors/categories.js';
import { USER_AGENT } from '../config/config.js';

/**
 * Lowercased names the client always sets; custom headers cannot replace them
 */
const REQUIRED_HEADERS = new Set(['authorization', 'content-type', 'accept', 'user-agent']);

/**
 * Interface for managing authentication headers
 */
export interface AuthManager {
  /**
   * Generates the headers sent with every API request
   */
  getHeaders(): Record<string, string>;
}

/**
 * Bearer token authentication for KeyEnv service tokens
 */
export class BearerAuthManager implements AuthManager {
  private readonly token: string;
  private readonly customHeaders: Record<string, string>;

  constructor(options: { token: string; customHeaders?: Record<string, string> }) {
    if (!options.token) {
      throw new ConfigurationError('KeyEnv token is required');
    }
    this.token = options.token;
    this.customHeaders = options.customHeaders ?? {};
  }

  getHeaders(): Record<string, string> {
    const custom = Object.entries(this.customHeaders).filter(
      ([name]) => !REQUIRED_HEADERS.has(name.toLowerCase())
    );
    return {
      ...Object.fromEntries(custom),
      'Authorization': `Bearer ${this.token}`,
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      'User-Agent': USER_AGENT,
    };
  }
}

/**
 * Creates a default AuthManager instance
 */
export function createAuthManager(options: {
  token: string;
  customHeaders?: Record<string, string>;
}): AuthManager {
  return new BearerAuthManager(options);
}
