import { DynamicModule, Module } from '@nestjs/common';

import { CheckerModule } from '../checker/checker.module';
import { ScimTesterConfigModule } from '../config/scim-tester-config.module';
import type { ScimTesterOverrides } from '../config/scim-tester.config';
import { LoggingModule } from '../logging/logging.module';

@Module({})
export class AppModule {
  static forRoot(overrides: ScimTesterOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ScimTesterConfigModule.forRoot(overrides), LoggingModule, CheckerModule],
    };
  }
}
