import { DynamicModule, Global, Module } from '@nestjs/common';
import { HIVE_OPTIONS } from './hive.tokens';
import { HiveModuleOptions } from './options';
import { HiveRuntime } from './runtime';

@Global()
@Module({})
/** Global Nest module that exposes a configured `HiveRuntime`. */
export class HiveModule {
  /** Creates a globally-available alerter for one rule. Invalid rule config fails module creation. */
  static forRoot(options: HiveModuleOptions): DynamicModule {
    return {
      module: HiveModule,
      providers: [
        {
          provide: HIVE_OPTIONS,
          useValue: options,
        },
        {
          provide: HiveRuntime,
          useFactory: (input: HiveModuleOptions) => new HiveRuntime(input),
          inject: [HIVE_OPTIONS],
        },
      ],
      exports: [HiveRuntime],
      global: true,
    };
  }
}
