import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HOST_ATTRIBUTES_SOURCE,
  HOST_VARS_CONFIG,
  HOST_VARS_PARAMETER_SOURCE,
  SKIP_FLAG,
} from './constants';
import { MissingRequiredAttributeError } from './errors';
import {
  HostAttributes,
  HostBatchResult,
  HostEntry,
  HostResolution,
  JsonValue,
  ModuleOptions,
  ParameterFetchResult,
  ParameterSource,
  PathOutcome,
  ResolutionReport,
} from './interface';
import { HostPathUtil, PathSpec } from './utils/host-path.util';
import { ParamStoreUtil } from './utils/param-store.util';
import { VariableBundleUtil } from './utils/variable-bundle.util';

/**
 * Resolves the variables of a host from the parameter hierarchy.
 *
 * Every path built from the host's attributes is looked up in order, lowest
 * precedence first. Bundles found along the way are merged key by key, so a
 * more specific path overrides a more generic one. The host's own attributes
 * are merged last and always win.
 *
 * Merging is shallow: a nested object or list from a later source replaces
 * the earlier value as a whole.
 *
 * @example
 * ```typescript
 * constructor(private readonly hostVars: HostVarsService) {}
 *
 * async varsFor() {
 *   const { variables, report } = await this.hostVars.resolve(
 *     { Role: 'mysql', Environment: 'prod', Cluster: 'primary' },
 *     'mysql-1',
 *   );
 * }
 * ```
 */
@Injectable()
export class HostVarsService {
  private readonly logger = new Logger(HostVarsService.name);
  private readonly basePath: string;

  constructor(
    @Inject(HOST_VARS_CONFIG) private readonly config: ModuleOptions,
    @Inject(HOST_VARS_PARAMETER_SOURCE)
    private readonly parameterSource: ParameterSource,
  ) {
    this.basePath = HostPathUtil.normalizeBasePath(config.basePath);
  }

  getBasePath(): string {
    return this.basePath;
  }

  /**
   * Candidate paths for a host under the configured base path.
   *
   * @throws MissingRequiredAttributeError if Role, Environment or Cluster is absent
   */
  buildPaths(attributes: HostAttributes): PathSpec {
    return HostPathUtil.buildPaths(this.basePath, attributes);
  }

  /**
   * Resolve the final variables of one host.
   *
   * A lookup that fails, finds nothing or returns a payload that is not a
   * JSON object only drops that path's contribution; it is recorded in the
   * report and resolution carries on.
   *
   * @param attributes - Host attributes from the inventory
   * @param hostName - Name used in logs and in the report
   * @throws MissingRequiredAttributeError if a required attribute is absent
   *         and `continueOnMissingAttributes` is false
   */
  async resolve(
    attributes: HostAttributes,
    hostName = 'unknown',
  ): Promise<HostResolution> {
    const report: ResolutionReport = {
      host: hostName,
      skipped: false,
      missingAttributes: [],
      paths: [],
      outcomes: [],
      sources: {},
      hostOverrides: [],
    };

    if (ParamStoreUtil.parseBoolean(attributes[SKIP_FLAG])) {
      this.logger.debug(
        `Skipping AWS vars lookup for host ${hostName} due to ${SKIP_FLAG}=true`,
      );
      report.skipped = true;
      return this.finish(new Map(), attributes, report);
    }

    let paths: PathSpec;
    try {
      paths = this.buildPaths(attributes);
    } catch (error) {
      if (
        error instanceof MissingRequiredAttributeError &&
        this.config.continueOnMissingAttributes !== false
      ) {
        this.logger.warn(
          `Host ${hostName} is missing required attributes for AWS vars lookup: ` +
            `${error.missingAttributes.join(', ')}. Using host attributes only.`,
        );
        report.missingAttributes = error.missingAttributes;
        return this.finish(new Map(), attributes, report);
      }
      throw error;
    }

    report.paths = [...paths];
    this.logger.debug(
      `Constructed paths for host ${hostName} (generic to specific): ${paths.join(', ')}`,
    );

    const results = this.config.concurrentFetch
      ? await Promise.all(paths.map((path) => this.fetchPath(path)))
      : await this.fetchSequentially(paths);

    const accumulator = new Map<string, JsonValue>();
    results.forEach((result, index) => {
      report.outcomes.push(
        this.mergeResult(paths[index], result, accumulator, report),
      );
    });

    return this.finish(accumulator, attributes, report);
  }

  /**
   * Resolve a batch of hosts concurrently.
   * A host that cannot be resolved does not affect the others.
   *
   * @returns One result per host, in input order
   */
  async resolveMany(hosts: HostEntry[]): Promise<HostBatchResult[]> {
    const settled = await Promise.allSettled(
      hosts.map((host) => this.resolve(host.attributes, host.name)),
    );

    return settled.map((result, index): HostBatchResult => {
      const host = hosts[index].name;
      if (result.status === 'fulfilled') {
        return { host, status: 'resolved', resolution: result.value };
      }
      const error =
        result.reason instanceof Error
          ? result.reason
          : new Error(String(result.reason));
      this.logger.error(`Failed to resolve host ${host}: ${error.message}`);
      return { host, status: 'failed', error };
    });
  }

  private async fetchSequentially(
    paths: PathSpec,
  ): Promise<ParameterFetchResult[]> {
    const results: ParameterFetchResult[] = [];
    for (const path of paths) {
      results.push(await this.fetchPath(path));
    }
    return results;
  }

  private async fetchPath(path: string): Promise<ParameterFetchResult> {
    try {
      return await this.parameterSource.fetch(path);
    } catch (error) {
      return {
        status: 'error',
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private mergeResult(
    path: string,
    result: ParameterFetchResult,
    accumulator: Map<string, JsonValue>,
    report: ResolutionReport,
  ): PathOutcome {
    if (result.status === 'not-found') {
      this.logger.debug(`No parameter at ${path}`);
      return { path, status: 'not-found' };
    }

    if (result.status === 'error') {
      this.logger.warn(
        `Error getting SSM parameter for path ${path}: ${result.detail}`,
      );
      return { path, status: 'error', detail: result.detail };
    }

    const decoded = VariableBundleUtil.decode(result.payload);
    if (decoded.kind === 'malformed') {
      this.logger.warn(
        `SSM parameter '${result.name}' is not valid JSON, skipping`,
      );
      return { path, status: 'malformed', reason: decoded.reason };
    }
    if (decoded.kind === 'not-an-object') {
      this.logger.warn(
        `SSM parameter '${result.name}' is not a JSON dictionary, skipping`,
      );
      return {
        path,
        status: 'malformed',
        reason: `Expected a JSON object, got ${decoded.actualType}`,
      };
    }

    const keys = Object.keys(decoded.bundle);
    for (const key of keys) {
      const value = decoded.bundle[key];
      accumulator.set(key, value);
      report.sources[key] = path;

      if (this.config.enableParameterLogging) {
        this.logger.debug(
          `Setting/updating '${key}' from SSM path ${path}: ${ParamStoreUtil.maskValue(value, key)}`,
        );
      }
    }
    return { path, status: 'bundle', keys };
  }

  private finish(
    accumulator: Map<string, JsonValue>,
    attributes: HostAttributes,
    report: ResolutionReport,
  ): HostResolution {
    for (const [key, value] of Object.entries(attributes)) {
      if (key === SKIP_FLAG || value === undefined) {
        continue;
      }

      const overriddenPath = accumulator.has(key)
        ? report.sources[key]
        : undefined;
      if (overriddenPath !== undefined) {
        report.hostOverrides.push({ key, path: overriddenPath });
      }
      accumulator.set(key, value);
      report.sources[key] = HOST_ATTRIBUTES_SOURCE;
    }

    if (report.hostOverrides.length > 0) {
      this.logger.warn(
        `Host ${report.host} has host_vars that override AWS parameters: ` +
          report.hostOverrides
            .map((override) => `SSM:${override.path}:${override.key}`)
            .join(', '),
      );
    }

    if (!report.skipped) {
      this.logger.log(
        `Resolved ${accumulator.size} variable(s) for host ${report.host} from ` +
          `${report.outcomes.filter((outcome) => outcome.status === 'bundle').length} parameter(s)`,
      );
    }

    return { variables: Object.fromEntries(accumulator), report };
  }
}
