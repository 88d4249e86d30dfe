import { Module } from '@nestjs/common';

import { CheckerLogger } from '../../logging/checker-logger.service';
import { SCIM_TESTER_CONFIG, ScimTesterConfig } from '../../config/scim-tester.config';
import { HttpScimClient } from './http-scim-client';
import { SCIM_CLIENT } from './scim-client.tokens';

@Module({
  providers: [
    {
      provide: SCIM_CLIENT,
      useFactory: (config: ScimTesterConfig, logger: CheckerLogger) =>
        new HttpScimClient({
          baseUrl: config.baseUrl,
          token: config.token,
          timeoutMs: config.timeoutMs,
          logger,
        }),
      inject: [SCIM_TESTER_CONFIG, CheckerLogger],
    },
  ],
  exports: [SCIM_CLIENT],
})
export class ScimClientModule {}
