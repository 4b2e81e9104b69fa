/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Locally known facts about a host, as provided by the inventory.
 *
 * `Role`, `Environment` and `Cluster` are required to build parameter paths;
 * `node_type` and `fqdn` add the more specific levels of the hierarchy.
 *
 * @example
 * ```typescript
 * {
 *   Role: 'mysql',
 *   Environment: 'prod',
 *   Cluster: 'primary',
 *   node_type: 'master',
 *   fqdn: 'mysql1.prod.example.com',
 * }
 * ```
 */
export interface HostAttributes {
  [key: string]: JsonValue | undefined;
  Role?: string;
  Environment?: string;
  Cluster?: string;
  node_type?: string;
  fqdn?: string;

  /**
   * When `true` (or the string `"true"`), no remote lookup is made and the
   * host attributes are returned as they are.
   */
  skip_aws_vars?: boolean | string;
}

/**
 * Variables decoded from a single parameter payload.
 */
export type VariableBundle = JsonObject;

/**
 * Final variable set for one host.
 */
export type MergedVariables = JsonObject;
