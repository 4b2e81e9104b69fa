import { FetchMode, JsonValue } from '../interface';

interface ErrorDetails {
  name?: string;
  code?: string;
  message?: string;
}

/**
 * Utility class for AWS SSM Parameter Store operations.
 * Provides validation, error handling, and security helpers.
 */
export class ParamStoreUtil {
  /**
   * List of sensitive keywords that should be masked in logs.
   * Variables containing these keywords will have their values hidden.
   */
  private static readonly sensitiveKeywords = [
    'password',
    'passwd',
    'pwd',
    'secret',
    'key',
    'token',
    'auth',
    'credential',
    'api_key',
    'apikey',
    'access_key',
    'private',
    'salt',
  ];

  /**
   * Parse a configuration value as boolean.
   * Handles both boolean and string values from ConfigService.
   *
   * @param value - The value to parse
   * @param defaultValue - Returned when the value is not set at all
   * @returns true if value is boolean true or string "true" (any case)
   *
   * @example
   * ```typescript
   * ParamStoreUtil.parseBoolean(true); // true
   * ParamStoreUtil.parseBoolean('TRUE'); // true
   * ParamStoreUtil.parseBoolean('anything'); // false
   * ParamStoreUtil.parseBoolean(undefined, true); // true
   * ```
   */
  static parseBoolean(value: unknown, defaultValue = false): boolean {
    if (value === undefined || value === null) return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  }

  /**
   * Parse the fetch mode from configuration, falling back to `parameter`.
   */
  static parseFetchMode(value: unknown): FetchMode {
    return value === 'path' ? 'path' : 'parameter';
  }

  /**
   * Determines if a variable key should have its value masked in logs.
   *
   * @example
   * ```typescript
   * ParamStoreUtil.shouldMaskValue('mysql_root_password'); // true
   * ParamStoreUtil.shouldMaskValue('mysql_port'); // false
   * ```
   */
  static shouldMaskValue(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return this.sensitiveKeywords.some((keyword) => lowerKey.includes(keyword));
  }

  /**
   * Renders a variable value for logging, masking it when the key is sensitive.
   * Non-string values are rendered as JSON.
   *
   * @example
   * ```typescript
   * ParamStoreUtil.maskValue('hunter2', 'db_password'); // '***MASKED***'
   * ParamStoreUtil.maskValue(3306, 'mysql_port'); // '3306'
   * ```
   */
  static maskValue(value: JsonValue, key: string): string {
    if (this.shouldMaskValue(key)) {
      return '***MASKED***';
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
  }

  /**
   * @throws Error if the region is missing or blank
   */
  static validateRegion(awsRegion: string | undefined): void {
    if (!awsRegion || awsRegion.trim() === '') {
      throw new Error(
        'AWS region is required. Please provide a valid AWS region (e.g., us-east-1)',
      );
    }
  }

  /**
   * @throws Error if the path is blank or does not start with '/'
   */
  static validateParameterPath(parameterPath: string): void {
    if (!parameterPath || parameterPath.trim() === '') {
      throw new Error(
        'Parameter Store path is required. Please provide a valid path (e.g., /aws_vars/ansible_vars)',
      );
    }

    if (!parameterPath.startsWith('/')) {
      throw new Error(
        `Parameter Store path must start with '/'. Received: '${parameterPath}'`,
      );
    }
  }

  /**
   * Path one level above the given parameter name.
   *
   * @example
   * ```typescript
   * ParamStoreUtil.parentPath('/aws_vars/mysql/ansible_vars'); // '/aws_vars/mysql'
   * ParamStoreUtil.parentPath('/ansible_vars'); // '/'
   * ```
   */
  static parentPath(parameterPath: string): string {
    const index = parameterPath.lastIndexOf('/');
    return index > 0 ? parameterPath.slice(0, index) : '/';
  }

  /**
   * True for the SSM error raised when a named parameter does not exist.
   */
  static isNotFoundError(error: unknown): boolean {
    return this.describeError(error).name === 'ParameterNotFound';
  }

  /**
   * Builds a detailed error message based on the error type.
   * Provides context-specific guidance for common AWS SSM errors.
   *
   * @param error - The caught error object
   * @param awsRegion - AWS region being accessed
   * @param parameterPath - Parameter path being accessed
   */
  static buildErrorMessage(
    error: unknown,
    awsRegion: string,
    parameterPath: string,
  ): string {
    const { name, code, message } = this.describeError(error);
    const baseMessage = `Failed to fetch parameter from AWS SSM Parameter Store. Region: '${awsRegion}', Path: '${parameterPath}'`;

    if (name === 'AccessDeniedException') {
      return (
        `${baseMessage} - Access Denied. ` +
        `Ensure the IAM role/user has 'ssm:GetParameter' and 'ssm:GetParametersByPath' permission for the path. ` +
        `Error: ${message}`
      );
    }

    if (name === 'InvalidParameterException' || name === 'ValidationException') {
      return (
        `${baseMessage} - Invalid parameter. ` +
        `Check that the path format is correct (must start with '/'). ` +
        `Error: ${message}`
      );
    }

    if (name === 'ThrottlingException') {
      return (
        `${baseMessage} - Request throttled. ` +
        `AWS SSM API rate limit exceeded. ` +
        `Error: ${message}`
      );
    }

    if (code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
      return (
        `${baseMessage} - Network error. ` +
        `Unable to reach AWS SSM service. Check network connectivity and AWS service status. ` +
        `Error: ${message}`
      );
    }

    if (message?.includes('Missing credentials')) {
      return (
        `${baseMessage} - Missing AWS credentials. ` +
        `Configure credentials via environment variables, AWS credentials file, or IAM role. ` +
        `Error: ${message}`
      );
    }

    return `${baseMessage} - ${message || 'Unknown error occurred'}`;
  }

  private static describeError(error: unknown): ErrorDetails {
    if (typeof error !== 'object' || error === null) {
      return { message: error === undefined ? undefined : String(error) };
    }

    const details: ErrorDetails = {};
    if ('name' in error && typeof error.name === 'string') {
      details.name = error.name;
    }
    if ('code' in error && typeof error.code === 'string') {
      details.code = error.code;
    }
    if ('message' in error && typeof error.message === 'string') {
      details.message = error.message;
    }
    return details;
  }
}
