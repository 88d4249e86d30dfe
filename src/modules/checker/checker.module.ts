import { Module } from '@nestjs/common';

import { ScimClientModule } from '../scim/client/scim-client.module';
import { CheckerService } from './checker.service';

@Module({
  imports: [ScimClientModule],
  providers: [CheckerService],
  exports: [CheckerService],
})
export class CheckerModule {}
