import { Global, Module } from '@nestjs/common';

import { CheckerLogger } from './checker-logger.service';

@Global()
@Module({
  providers: [CheckerLogger],
  exports: [CheckerLogger]
})
export class LoggingModule {}
