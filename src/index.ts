export { Status, summarize, success, error, skipped } from './modules/checker/check-result';
export type { CheckResult, CheckResultInit, Report } from './modules/checker/check-result';
export { decorateCheck, resultFromError } from './modules/checker/check-runner';
export type { CheckReturn, CheckOutcome, DecoratedCheck, ResultListener } from './modules/checker/check-runner';
export { checkServer } from './modules/checker/checker';
export type { CheckServerOptions } from './modules/checker/checker';
export { checkResourceType } from './modules/checker/checks/resource.check';
export type { ResourceCheckContext } from './modules/checker/checks/resource.check';
export { CheckerService } from './modules/checker/checker.service';
export { AppModule } from './modules/app/app.module';
export { HttpScimClient } from './modules/scim/client/http-scim-client';
export type { HttpScimClientOptions, FetchFn } from './modules/scim/client/http-scim-client';
export type { ScimClient } from './modules/scim/client/scim-client.interface';
export { parseScimResponse } from './modules/scim/client/scim-response.parser';
export {
  ScimTesterError,
  ScimTransportError,
  ScimParseError,
  ConfigurationError,
} from './modules/scim/common/scim-errors';
export type { ScimMessage, ScimResource, ScimSchema, ResourceType, ServiceProviderConfig } from './modules/scim/models/scim-models';
export { formatReport } from './modules/report/report-printer';
