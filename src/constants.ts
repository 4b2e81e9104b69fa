/**
 * Dependency injection token for the resolved module options.
 */
export const HOST_VARS_CONFIG = 'HOST_VARS_CONFIG';

/**
 * Dependency injection token for the {@link ParameterSource} the resolver reads from.
 * Bound to ParameterStoreFetcherService unless a custom source is registered.
 */
export const HOST_VARS_PARAMETER_SOURCE = 'HOST_VARS_PARAMETER_SOURCE';

/**
 * Base path used when none is configured.
 */
export const DEFAULT_BASE_PATH = '/aws_vars';

/**
 * Final path segment shared by every hierarchical parameter.
 */
export const ANSIBLE_VARS_SEGMENT = 'ansible_vars';

/**
 * Host attribute that bypasses all remote lookups when set.
 */
export const SKIP_FLAG = 'skip_aws_vars';

/**
 * Source recorded in resolution reports for keys supplied by the host itself.
 */
export const HOST_ATTRIBUTES_SOURCE = 'host_vars';

/**
 * Configuration key for AWS region in ConfigService.
 * Expected value: AWS region string (e.g., 'us-east-1', 'eu-west-1')
 */
export const HOST_VARS_AWS_REGION = 'host-vars.awsRegion';

/**
 * Configuration key for the hierarchy base path in ConfigService.
 * Expected value: Path string starting with '/' (e.g., '/aws_vars')
 */
export const HOST_VARS_BASE_PATH = 'host-vars.basePath';

/**
 * Configuration key for the Parameter Store fetch mode.
 * Expected value: 'parameter' or 'path'
 */
export const HOST_VARS_FETCH_MODE = 'host-vars.fetchMode';

/**
 * Configuration key for concurrent path fetching.
 * Expected value: Boolean
 */
export const HOST_VARS_CONCURRENT_FETCH = 'host-vars.concurrentFetch';

/**
 * Configuration key for falling back to host attributes when
 * Role, Environment or Cluster is missing.
 * Expected value: Boolean, defaults to true
 */
export const HOST_VARS_CONTINUE_ON_MISSING_ATTRIBUTES =
  'host-vars.continueOnMissingAttributes';

/**
 * Configuration key for parameter logging flag in ConfigService.
 * When enabled, merged keys and masked values are logged at debug level.
 */
export const HOST_VARS_ENABLE_LOGGING = 'host-vars.enableParameterLogging';
