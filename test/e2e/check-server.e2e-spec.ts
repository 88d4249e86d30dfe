import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { CheckResult, Status } from '@app/modules/checker/check-result';
import { checkServer } from '@app/modules/checker/checker';
import { CheckerService } from '@app/modules/checker/checker.service';
import { AppModule } from '@app/modules/app/app.module';
import { HttpScimClient } from '@app/modules/scim/client/http-scim-client';
import { MockScimServer, startMockScimServer } from './helpers/app.helper';

const LIFECYCLE = [
  'Unknown resource read',
  'Object creation',
  'Object query',
  'Object listing',
  'Filtered query',
  'Object search',
  'Object replacement',
  'Object patch',
  'Object deletion',
  'Query after deletion',
];

const DISCOVERY = [
  'Service provider configuration endpoint',
  'Schemas endpoint',
  'Resource types endpoint',
  'Random URL returns a 404 Error',
];

const lifecycle = (name: string): string[] => LIFECYCLE.map((label) => `${label} (${name})`);
const titles = (report: CheckResult[]): string[] => report.map((result) => result.title);
const failures = (report: CheckResult[]): CheckResult[] => report.filter((result) => result.status !== Status.SUCCESS);

describe('checkServer against a conforming server (e2e)', () => {
  let server: MockScimServer;
  let client: HttpScimClient;

  beforeAll(async () => {
    server = await startMockScimServer();
    client = new HttpScimClient({ baseUrl: server.baseUrl, token: 'test-secret', timeoutMs: 5000 });
  });

  afterAll(async () => {
    await server.app.close();
  });

  it('should pass every check', async () => {
    const report = await checkServer(client);

    expect(failures(report)).toEqual([]);
    expect(titles(report)).toEqual([...DISCOVERY, ...lifecycle('User'), ...lifecycle('Group')]);
  });

  it('should produce the same sequence on a second run', async () => {
    const first = await checkServer(client);
    const second = await checkServer(client);

    expect(second.map(({ status, title }) => [status, title])).toEqual(first.map(({ status, title }) => [status, title]));
  });

  it('should only exercise the requested resource types', async () => {
    const report = await checkServer(client, { resourceTypes: ['group'] });

    expect(report.find((result) => result.title === 'Resource checks (User)')).toEqual({
      status: Status.SKIPPED,
      title: 'Resource checks (User)',
      reason: 'User is not among the requested resource types',
    });
    expect(titles(report)).toEqual([...DISCOVERY, 'Resource checks (User)', ...lifecycle('Group')]);
    expect(failures(report)).toHaveLength(1);
  });

  it('should report the created object in the creation result', async () => {
    const report = await checkServer(client, { resourceTypes: ['User'] });
    const creation = report.find((result) => result.title === 'Object creation (User)');

    expect(creation?.status).toBe(Status.SUCCESS);
    expect(creation?.reason).toMatch(/^Created User [0-9a-f-]{36}$/);
    expect(creation?.data).toMatchObject({
      schemas: ['urn:ietf:params:scim:schemas:core:2.0:User', 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User'],
      active: true,
      meta: { resourceType: 'User' },
    });
  });

  it('should run through the application context', async () => {
    const context: INestApplicationContext = await NestFactory.createApplicationContext(
      AppModule.forRoot({ baseUrl: server.baseUrl, token: 'test-secret', resourceTypes: ['Group'] }),
      { logger: false },
    );
    try {
      const seen: string[] = [];
      const report = await context.get(CheckerService).run((result) => seen.push(result.title));

      expect(seen).toEqual(titles(report));
      expect(report.filter((result) => result.status === Status.SUCCESS)).toHaveLength(DISCOVERY.length + LIFECYCLE.length);
    } finally {
      await context.close();
    }
  });
});

describe('checkServer against an unreachable server (e2e)', () => {
  it('should report transport failures and skip the resource checks', async () => {
    const server = await startMockScimServer();
    const { baseUrl } = server;
    await server.app.close();

    const report = await checkServer(new HttpScimClient({ baseUrl, timeoutMs: 2000 }));

    expect(report.map(({ status, title }) => [status, title])).toEqual([
      ...DISCOVERY.map((title) => [Status.ERROR, title]),
      [Status.SKIPPED, 'Resource checks (User)'],
      [Status.SKIPPED, 'Resource checks (Group)'],
    ]);
    expect(report[0]?.reason).toContain(`GET ${baseUrl}/ServiceProviderConfig failed`);
  });
});
