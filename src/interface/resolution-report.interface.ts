import { HostAttributes, MergedVariables } from './host-attributes.interface';

/**
 * What happened when one path was queried.
 */
export type PathOutcome =
  | { path: string; status: 'bundle'; keys: string[] }
  | { path: string; status: 'not-found' }
  | { path: string; status: 'malformed'; reason: string }
  | { path: string; status: 'error'; detail: string };

/**
 * A host attribute that replaced a value fetched from the parameter store.
 */
export interface HostOverride {
  key: string;
  /** Path whose value was discarded */
  path: string;
}

/**
 * Diagnostic trail for one host resolution.
 *
 * Lets operators audit which path supplied which key, and which paths
 * were missing, malformed or failed.
 */
export interface ResolutionReport {
  host: string;

  /** True when `skip_aws_vars` bypassed every remote lookup */
  skipped: boolean;

  /** Required attributes that were absent, when the host could not be resolved remotely */
  missingAttributes: string[];

  /** Paths queried, lowest precedence first */
  paths: string[];

  outcomes: PathOutcome[];

  /**
   * Final key mapped to the path that supplied it,
   * or `host_vars` for keys taken from the host attributes.
   */
  sources: Record<string, string>;

  hostOverrides: HostOverride[];
}

export interface HostResolution {
  variables: MergedVariables;
  report: ResolutionReport;
}

/**
 * One host of a batch passed to `HostVarsService.resolveMany`.
 */
export interface HostEntry {
  name: string;
  attributes: HostAttributes;
}

export type HostBatchResult =
  | { host: string; status: 'resolved'; resolution: HostResolution }
  | { host: string; status: 'failed'; error: Error };
