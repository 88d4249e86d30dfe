import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { SCIM_TESTER_CONFIG, ScimTesterConfig } from '../config/scim-tester.config';
import { CheckerLogger } from '../logging/checker-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { ScimClient } from '../scim/client/scim-client.interface';
import { SCIM_CLIENT } from '../scim/client/scim-client.tokens';
import { CheckResult, Report, Status, summarize } from './check-result';
import { checkServer } from './checker';

/**
 * CheckerService — runs checkServer() against the configured server inside
 * a correlation context, logging every result as it arrives.
 */
@Injectable()
export class CheckerService {
  constructor(
    @Inject(SCIM_CLIENT) private readonly client: ScimClient,
    @Inject(SCIM_TESTER_CONFIG) private readonly config: ScimTesterConfig,
    private readonly logger: CheckerLogger,
  ) {}

  run(onResult?: (result: CheckResult) => void): Promise<Report> {
    const context = { runId: randomUUID(), baseUrl: this.config.baseUrl, startTime: Date.now() };
    return this.logger.runWithContext(context, async () => {
      this.logger.info(LogCategory.GENERAL, 'Check run started', {
        resourceTypes: this.config.resourceTypes ?? 'all discovered',
      });

      const report = await checkServer(this.client, {
        resourceTypes: this.config.resourceTypes,
        logger: this.logger,
        onResult: (result) => {
          this.logResult(result);
          onResult?.(result);
        },
      });

      this.logger.info(LogCategory.GENERAL, 'Check run finished', summarize(report));
      return report;
    });
  }

  private logResult(result: CheckResult): void {
    const data = { status: result.status, reason: result.reason };
    switch (result.status) {
      case Status.ERROR:
        this.logger.warn(LogCategory.CHECK, result.title, data);
        break;
      case Status.SKIPPED:
        this.logger.info(LogCategory.CHECK, result.title, data);
        break;
      default:
        this.logger.debug(LogCategory.CHECK, result.title, data);
    }
  }
}
