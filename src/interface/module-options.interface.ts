import { ParameterSource } from './parameter-source.interface';

/**
 * How the Parameter Store is asked whether a path holds a value.
 *
 * - `parameter`: one `GetParameter` call for the exact name
 * - `path`: `GetParametersByPath` on the parent path, matching the exact name
 */
export type FetchMode = 'parameter' | 'path';

/**
 * Configuration options for the HostVarsModule.
 *
 * @example
 * Basic configuration:
 * ```typescript
 * {
 *   awsRegion: 'us-east-1',
 * }
 * ```
 *
 * @example
 * Custom hierarchy root, fetched concurrently:
 * ```typescript
 * {
 *   awsRegion: 'eu-west-1',
 *   basePath: '/infra/vars',
 *   concurrentFetch: true,
 * }
 * ```
 */
export interface ModuleOptions {
  /**
   * AWS region of the Parameter Store.
   * Required unless a custom `parameterSource` is supplied.
   *
   * @example 'us-east-1', 'eu-west-1'
   */
  awsRegion?: string;

  /**
   * Root of the variable hierarchy. Must start with '/'.
   * Trailing slashes are ignored.
   *
   * @default '/aws_vars'
   */
  basePath?: string;

  /**
   * @default 'parameter'
   */
  fetchMode?: FetchMode;

  /**
   * Fetch every path of a host at once, then merge in precedence order.
   *
   * @default false
   */
  concurrentFetch?: boolean;

  /**
   * What to do when a host lacks Role, Environment or Cluster.
   *
   * - `true`: Log a warning and return the host attributes alone
   * - `false`: Throw MissingRequiredAttributeError
   *
   * @default true
   */
  continueOnMissingAttributes?: boolean;

  /**
   * Log every merged key at debug level.
   * Sensitive values (passwords, secrets, keys, tokens) are masked.
   *
   * @default false
   */
  enableParameterLogging?: boolean;

  /**
   * Replaces the built-in Parameter Store source.
   */
  parameterSource?: ParameterSource;
}
