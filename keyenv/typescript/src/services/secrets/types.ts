/**
 * Body of create (with `key`) and update (without) requests
 */
export interface SecretWriteRequest {
  key?: string;
  value: string;
  description?: string;
}
