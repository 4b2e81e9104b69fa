import 'reflect-metadata';
import { HostVarsService } from './host-vars.service';
import { HostVarsModule } from './host-vars.module';
import {
  FetchMode,
  HostAttributes,
  HostBatchResult,
  HostEntry,
  HostOverride,
  HostResolution,
  JsonObject,
  JsonValue,
  MergedVariables,
  ModuleAsyncOptions,
  ModuleOptions,
  ParameterFetchResult,
  ParameterSource,
  PathOutcome,
  ResolutionReport,
  VariableBundle,
} from './interface';
import {
  DEFAULT_BASE_PATH,
  HOST_VARS_CONFIG,
  HOST_VARS_PARAMETER_SOURCE,
} from './constants';
import { MissingRequiredAttributeError } from './errors';
import { ParameterStoreFetcherService } from './services';
import {
  HierarchyGroup,
  HierarchyPath,
  HostPathUtil,
  PathSpec,
} from './utils/host-path.util';
import {
  BundleDecodeResult,
  VariableBundleUtil,
} from './utils/variable-bundle.util';

export {
  DEFAULT_BASE_PATH,
  HOST_VARS_CONFIG,
  HOST_VARS_PARAMETER_SOURCE,
  HostVarsService,
  HostVarsModule,
  HostPathUtil,
  VariableBundleUtil,
  MissingRequiredAttributeError,
  ParameterStoreFetcherService,
  BundleDecodeResult,
  FetchMode,
  HierarchyGroup,
  HierarchyPath,
  HostAttributes,
  HostBatchResult,
  HostEntry,
  HostOverride,
  HostResolution,
  JsonObject,
  JsonValue,
  MergedVariables,
  ModuleAsyncOptions,
  ModuleOptions,
  ParameterFetchResult,
  ParameterSource,
  PathOutcome,
  PathSpec,
  ResolutionReport,
  VariableBundle,
};
