import { ANSIBLE_VARS_SEGMENT, DEFAULT_BASE_PATH } from '../constants';
import { MissingRequiredAttributeError } from '../errors';
import { HostAttributes } from '../interface';

export type HierarchyGroup = 'BASE' | 'GLOBAL' | 'ENVIRONMENT';

/**
 * One candidate parameter path, with where it sits in the hierarchy.
 */
export interface HierarchyPath {
  path: string;
  group: HierarchyGroup;
  description: string;
}

/**
 * Ordered candidate paths for one host, lowest precedence first.
 */
export type PathSpec = readonly string[];

interface PathComponents {
  role: string;
  environment: string;
  cluster: string;
  nodeType?: string;
  fqdn?: string;
}

interface PathPattern {
  group: HierarchyGroup;
  description: string;
  segments: (components: PathComponents) => Array<string | undefined>;
}

// Order is precedence: later patterns override earlier ones.
const PATH_PATTERNS: PathPattern[] = [
  {
    group: 'BASE',
    description: 'Global variables',
    segments: () => [],
  },
  {
    group: 'BASE',
    description: 'Role-specific variables',
    segments: (c) => [c.role],
  },
  {
    group: 'GLOBAL',
    description: 'Global cluster variables',
    segments: (c) => [c.role, 'global', c.cluster],
  },
  {
    group: 'GLOBAL',
    description: 'Global cluster node type variables',
    segments: (c) => [c.role, 'global', c.cluster, c.nodeType],
  },
  {
    group: 'ENVIRONMENT',
    description: 'Environment variables',
    segments: (c) => [c.role, c.environment],
  },
  {
    group: 'ENVIRONMENT',
    description: 'Environment cluster variables',
    segments: (c) => [c.role, c.environment, c.cluster],
  },
  {
    group: 'ENVIRONMENT',
    description: 'Environment cluster node type variables',
    segments: (c) => [c.role, c.environment, c.cluster, c.nodeType],
  },
  {
    group: 'ENVIRONMENT',
    description: 'Host-specific variables',
    segments: (c) => [c.role, c.environment, c.cluster, c.fqdn],
  },
];

const REQUIRED_ATTRIBUTES = ['Role', 'Environment', 'Cluster'] as const;

/**
 * Derives the parameter paths a host's variables may live at.
 *
 * Path structure, generic to specific:
 * ```
 * {base}/ansible_vars
 * {base}/{Role}/ansible_vars
 * {base}/{Role}/global/{Cluster}/ansible_vars
 * {base}/{Role}/global/{Cluster}/{node_type}/ansible_vars
 * {base}/{Role}/{Environment}/ansible_vars
 * {base}/{Role}/{Environment}/{Cluster}/ansible_vars
 * {base}/{Role}/{Environment}/{Cluster}/{node_type}/ansible_vars
 * {base}/{Role}/{Environment}/{Cluster}/{fqdn}/ansible_vars
 * ```
 * Levels that need `node_type` or `fqdn` are left out when the host has none.
 */
export class HostPathUtil {
  /**
   * Apply the default and strip trailing slashes.
   *
   * @throws Error if the base path does not start with '/'
   *
   * @example
   * ```typescript
   * HostPathUtil.normalizeBasePath(undefined); // '/aws_vars'
   * HostPathUtil.normalizeBasePath('/infra/vars/'); // '/infra/vars'
   * HostPathUtil.normalizeBasePath('/'); // ''
   * ```
   */
  static normalizeBasePath(basePath?: string): string {
    const trimmed = basePath?.trim();
    if (!trimmed) {
      return DEFAULT_BASE_PATH;
    }
    if (!trimmed.startsWith('/')) {
      throw new Error(
        `Base path must start with '/'. Received: '${basePath}'`,
      );
    }
    return trimmed.replace(/\/+$/, '');
  }

  static normalizeFqdn(fqdn: string): string {
    return fqdn.split('.').join('_');
  }

  /**
   * @throws MissingRequiredAttributeError if Role, Environment or Cluster is absent
   */
  static buildHierarchy(
    basePath: string | undefined,
    attributes: HostAttributes,
  ): HierarchyPath[] {
    const base = this.normalizeBasePath(basePath);
    const components = this.extractComponents(attributes);
    const hierarchy: HierarchyPath[] = [];

    for (const pattern of PATH_PATTERNS) {
      const segments = pattern.segments(components);
      if (segments.some((segment) => segment === undefined)) {
        continue;
      }
      hierarchy.push({
        path: [base, ...segments, ANSIBLE_VARS_SEGMENT].join('/'),
        group: pattern.group,
        description: pattern.description,
      });
    }

    return hierarchy;
  }

  /**
   * @throws MissingRequiredAttributeError if Role, Environment or Cluster is absent
   */
  static buildPaths(
    basePath: string | undefined,
    attributes: HostAttributes,
  ): PathSpec {
    return Object.freeze(
      this.buildHierarchy(basePath, attributes).map((entry) => entry.path),
    );
  }

  private static extractComponents(attributes: HostAttributes): PathComponents {
    const role = this.readAttribute(attributes, 'Role');
    const environment = this.readAttribute(attributes, 'Environment');
    const cluster = this.readAttribute(attributes, 'Cluster');

    if (role === undefined || environment === undefined || cluster === undefined) {
      throw new MissingRequiredAttributeError(
        REQUIRED_ATTRIBUTES.filter(
          (name) => this.readAttribute(attributes, name) === undefined,
        ),
      );
    }

    const fqdn = this.readAttribute(attributes, 'fqdn');
    return {
      role,
      environment,
      cluster,
      nodeType: this.readAttribute(attributes, 'node_type'),
      fqdn: fqdn === undefined ? undefined : this.normalizeFqdn(fqdn),
    };
  }

  private static readAttribute(
    attributes: HostAttributes,
    name: string,
  ): string | undefined {
    const value = attributes[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
  }
}
