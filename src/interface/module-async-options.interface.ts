import { Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Async configuration options for HostVarsModule.
 *
 * The ConfigService should provide values for the following keys:
 * - `host-vars.awsRegion`: AWS region (string)
 * - `host-vars.basePath`: Hierarchy root (string, optional)
 * - `host-vars.fetchMode`: 'parameter' or 'path' (optional)
 * - `host-vars.concurrentFetch`: Concurrent fetch flag (boolean, optional)
 * - `host-vars.continueOnMissingAttributes`: Fallback flag (boolean, optional)
 * - `host-vars.enableParameterLogging`: Debug logging flag (boolean, optional)
 *
 * @example
 * ```typescript
 * @Module({
 *   imports: [
 *     HostVarsModule.registerAsync({
 *       import: ConfigModule,
 *       useClass: ConfigService,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
export interface ModuleAsyncOptions {
  /**
   * Module that provides the ConfigService, imported into HostVarsModule.
   */
  import: Type<unknown>;

  /**
   * The ConfigService class to use for retrieving configuration values.
   */
  useClass: Type<ConfigService>;
}
