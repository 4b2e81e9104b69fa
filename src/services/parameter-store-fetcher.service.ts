import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  GetParameterCommand,
  GetParametersByPathCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { HOST_VARS_CONFIG } from '../constants';
import {
  ModuleOptions,
  ParameterFetchResult,
  ParameterSource,
} from '../interface';
import { ParamStoreUtil } from '../utils/param-store.util';

/**
 * Parameter source backed by AWS Systems Manager Parameter Store.
 *
 * This service handles the communication with AWS SSM, including:
 * - Exact-name lookups (`fetchMode: 'parameter'`)
 * - Lookups through the parent path with automatic pagination (`fetchMode: 'path'`)
 * - Decryption of SecureString parameters
 * - Translation of AWS failures into `error` results with actionable messages
 *
 * @example
 * ```typescript
 * constructor(private readonly fetcher: ParameterStoreFetcherService) {}
 *
 * async lookup() {
 *   const result = await this.fetcher.fetch('/aws_vars/mysql/ansible_vars');
 *   if (result.status === 'found') {
 *     console.log(result.payload);
 *   }
 * }
 * ```
 */
@Injectable()
export class ParameterStoreFetcherService implements ParameterSource {
  private readonly logger = new Logger(ParameterStoreFetcherService.name);
  private readonly ssmClient: SSMClient;
  private readonly awsRegion: string;

  constructor(@Inject(HOST_VARS_CONFIG) private readonly config: ModuleOptions) {
    ParamStoreUtil.validateRegion(config.awsRegion);
    this.awsRegion = config.awsRegion ?? '';
    this.ssmClient = new SSMClient({ region: this.awsRegion });
    this.logger.log(
      `Initialized AWS SSM Parameter Store source - Region: ${this.awsRegion}, Mode: ${this.fetchMode}`,
    );
  }

  private get fetchMode() {
    return this.config.fetchMode ?? 'parameter';
  }

  /**
   * Look up the parameter stored under `parameterPath`.
   *
   * Never throws: a missing parameter yields `not-found`, any other
   * failure an `error` result carrying a descriptive message.
   */
  async fetch(parameterPath: string): Promise<ParameterFetchResult> {
    try {
      ParamStoreUtil.validateParameterPath(parameterPath);

      const result =
        this.fetchMode === 'path'
          ? await this.fetchByPath(parameterPath)
          : await this.fetchParameter(parameterPath);

      this.logger.debug(`Lookup of '${parameterPath}': ${result.status}`);
      return result;
    } catch (error) {
      if (ParamStoreUtil.isNotFoundError(error)) {
        this.logger.debug(`Lookup of '${parameterPath}': not-found`);
        return { status: 'not-found' };
      }

      const errorMessage = ParamStoreUtil.buildErrorMessage(
        error,
        this.awsRegion,
        parameterPath,
      );
      this.logger.warn(errorMessage);
      if (error instanceof Error) {
        this.logger.debug(`Error details: ${error.stack}`);
      }
      return { status: 'error', detail: errorMessage };
    }
  }

  private async fetchParameter(
    parameterPath: string,
  ): Promise<ParameterFetchResult> {
    const result = await this.ssmClient.send(
      new GetParameterCommand({ Name: parameterPath, WithDecryption: true }),
    );

    const value = result?.Parameter?.Value;
    if (value === undefined) {
      return { status: 'not-found' };
    }
    return {
      status: 'found',
      name: result.Parameter?.Name ?? parameterPath,
      payload: value,
    };
  }

  private async fetchByPath(
    parameterPath: string,
  ): Promise<ParameterFetchResult> {
    const parentPath = ParamStoreUtil.parentPath(parameterPath);
    let nextToken: string | undefined = undefined;
    let areMoreParametersToFetch = true;
    let pageCount = 0;

    while (areMoreParametersToFetch) {
      pageCount++;
      const commandInput: {
        Path: string;
        Recursive: boolean;
        WithDecryption: boolean;
        NextToken?: string;
      } = {
        Path: parentPath,
        Recursive: false,
        WithDecryption: true,
      };
      if (nextToken) {
        commandInput.NextToken = nextToken;
        this.logger.debug(
          `Fetching page ${pageCount} of '${parentPath}' with NextToken`,
        );
      }
      const result = await this.ssmClient.send(
        new GetParametersByPathCommand(commandInput),
      );

      const match = (result?.Parameters || []).find(
        (parameter) => parameter.Name === parameterPath,
      );
      if (match?.Value !== undefined) {
        return { status: 'found', name: parameterPath, payload: match.Value };
      }

      nextToken = result?.NextToken;
      areMoreParametersToFetch = !!nextToken;
    }

    return { status: 'not-found' };
  }
}
