/**
 * Mock upstream finance API for integration testing
 *
 * Why: Exercises the real HTTP flow (login, token header, GraphQL replay)
 * in process. Every request is recorded so tests can count upstream calls.
 *
 * By default login returns `token-1`, `token-2`, ... and GraphQL answers
 * from the fixtures by operation name. Queued replies override the defaults
 * one request at a time.
 */

import { http, HttpResponse } from 'msw';
import { setupServer, type SetupServer } from 'msw/node';
import { graphqlFixtures } from './fixtures.js';
import { isRecord } from '../validation-utils.js';

export const UPSTREAM_BASE_URL = 'https://finance-upstream.test';

export interface RecordedRequest {
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

export interface MockReply {
  status: number;
  body?: unknown;
}

async function record(request: Request): Promise<RecordedRequest> {
  const text = await request.text();
  const parsed: unknown = text ? JSON.parse(text) : {};
  return {
    headers: Object.fromEntries(request.headers.entries()),
    body: isRecord(parsed) ? parsed : {},
  };
}

function reply({ status, body }: MockReply) {
  return new HttpResponse(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export class MockUpstream {
  readonly logins: RecordedRequest[] = [];
  readonly graphqlCalls: RecordedRequest[] = [];
  readonly server: SetupServer;

  private loginQueue: MockReply[] = [];
  private graphqlQueue: MockReply[] = [];

  constructor(private baseUrl: string = UPSTREAM_BASE_URL) {
    this.server = setupServer(
      http.post(`${baseUrl}/auth/login/`, async ({ request }) => {
        this.logins.push(await record(request));
        const queued = this.loginQueue.shift();
        return reply(queued ?? { status: 200, body: { token: `token-${this.logins.length}` } });
      }),

      http.post(`${baseUrl}/graphql`, async ({ request }) => {
        const recorded = await record(request);
        this.graphqlCalls.push(recorded);
        const queued = this.graphqlQueue.shift();
        if (queued) {
          return reply(queued);
        }
        const operationName = String(recorded.body.operationName);
        return reply({ status: 200, body: { data: graphqlFixtures[operationName] ?? {} } });
      })
    );
  }

  queueLogin(...replies: MockReply[]): void {
    this.loginQueue.push(...replies);
  }

  queueGraphql(...replies: MockReply[]): void {
    this.graphqlQueue.push(...replies);
  }

  /**
   * Operation names of the recorded GraphQL calls, in order
   */
  operations(): string[] {
    return this.graphqlCalls.map(call => String(call.body.operationName));
  }

  /**
   * Unmatched upstream requests fail the test; anything else (supertest's
   * local server) passes through.
   */
  listen(): void {
    this.server.listen({
      onUnhandledRequest: (request, print) => {
        if (new URL(request.url).origin === this.baseUrl) {
          print.error();
        }
      },
    });
  }

  reset(): void {
    this.logins.length = 0;
    this.graphqlCalls.length = 0;
    this.loginQueue = [];
    this.graphqlQueue = [];
    this.server.resetHandlers();
  }

  close(): void {
    this.server.close();
  }
}
