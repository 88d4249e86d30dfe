import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { SCIM_TESTER_CONFIG, ScimTesterOverrides, buildScimTesterConfig } from './scim-tester.config';

@Global()
@Module({})
export class ScimTesterConfigModule {
  static forRoot(overrides: ScimTesterOverrides = {}): DynamicModule {
    return {
      module: ScimTesterConfigModule,
      imports: [ConfigModule.forRoot({ isGlobal: true })],
      providers: [
        {
          provide: SCIM_TESTER_CONFIG,
          useFactory: (config: ConfigService) => buildScimTesterConfig(config, overrides),
          inject: [ConfigService],
        },
      ],
      exports: [SCIM_TESTER_CONFIG],
    };
  }
}
