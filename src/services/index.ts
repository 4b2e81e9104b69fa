/**
 * Barrel export for injectable parameter sources.
 *
 * - ParameterStoreFetcherService: Looks up parameters in AWS Systems Manager Parameter Store
 */
export { ParameterStoreFetcherService } from './parameter-store-fetcher.service';
