import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HOST_VARS_AWS_REGION,
  HOST_VARS_BASE_PATH,
  HOST_VARS_CONCURRENT_FETCH,
  HOST_VARS_CONFIG,
  HOST_VARS_CONTINUE_ON_MISSING_ATTRIBUTES,
  HOST_VARS_ENABLE_LOGGING,
  HOST_VARS_FETCH_MODE,
  HOST_VARS_PARAMETER_SOURCE,
} from './constants';
import { ModuleAsyncOptions, ModuleOptions } from './interface';
import { HostVarsService } from './host-vars.service';
import { ParameterStoreFetcherService } from './services';
import { ParamStoreUtil } from './utils/param-store.util';

/**
 * Global NestJS module resolving host variables from a hierarchy of
 * AWS SSM Parameter Store entries.
 *
 * @example
 * Static registration:
 * ```typescript
 * @Module({
 *   imports: [
 *     HostVarsModule.register({
 *       awsRegion: 'us-east-1',
 *       basePath: '/aws_vars',
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example
 * Async registration with ConfigService:
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
 *
 * @example
 * With a custom parameter source:
 * ```typescript
 * HostVarsModule.register({
 *   parameterSource: new StaticParameterSource(entries),
 * })
 * ```
 */
@Global()
@Module({})
export class HostVarsModule {
  /**
   * Register the module with static configuration.
   */
  public static register(moduleOptions: ModuleOptions): DynamicModule {
    return {
      module: HostVarsModule,
      providers: [
        HostVarsService,
        { provide: HOST_VARS_CONFIG, useValue: moduleOptions },
        ...this.createSourceProviders(moduleOptions),
      ],
      exports: [HostVarsService],
    };
  }

  /**
   * Register the module with async configuration using ConfigService.
   *
   * @example
   * ```typescript
   * // In your .env or config:
   * // host-vars.awsRegion=us-east-1
   * // host-vars.basePath=/aws_vars
   *
   * HostVarsModule.registerAsync({
   *   import: ConfigModule,
   *   useClass: ConfigService,
   * })
   * ```
   */
  public static registerAsync(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: HostVarsModule,
      imports: [moduleAsyncOptions.import],
      providers: [
        HostVarsService,
        {
          provide: HOST_VARS_CONFIG,
          useFactory: (configService: ConfigService): ModuleOptions =>
            this.readOptions(configService),
          inject: [moduleAsyncOptions.useClass],
        },
        ...this.createSourceProviders({}),
      ],
      exports: [HostVarsService],
    };
  }

  private static createSourceProviders(moduleOptions: ModuleOptions): Provider[] {
    if (moduleOptions.parameterSource) {
      return [
        {
          provide: HOST_VARS_PARAMETER_SOURCE,
          useValue: moduleOptions.parameterSource,
        },
      ];
    }
    return [
      ParameterStoreFetcherService,
      {
        provide: HOST_VARS_PARAMETER_SOURCE,
        useExisting: ParameterStoreFetcherService,
      },
    ];
  }

  private static readOptions(configService: ConfigService): ModuleOptions {
    return {
      awsRegion: configService.get<string>(HOST_VARS_AWS_REGION),
      basePath: configService.get<string>(HOST_VARS_BASE_PATH),
      fetchMode: ParamStoreUtil.parseFetchMode(
        configService.get(HOST_VARS_FETCH_MODE),
      ),
      concurrentFetch: ParamStoreUtil.parseBoolean(
        configService.get(HOST_VARS_CONCURRENT_FETCH),
      ),
      continueOnMissingAttributes: ParamStoreUtil.parseBoolean(
        configService.get(HOST_VARS_CONTINUE_ON_MISSING_ATTRIBUTES),
        true,
      ),
      enableParameterLogging: ParamStoreUtil.parseBoolean(
        configService.get(HOST_VARS_ENABLE_LOGGING),
      ),
    };
  }
}
