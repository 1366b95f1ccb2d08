/**
 * Upstream session client
 *
 * Owns exactly one upstream authentication cycle: login (with an optional
 * one-time code), token caching, and GraphQL execution with a single
 * re-authentication when the token is rejected.
 *
 * One instance lives for one inbound request; tokens are never shared.
 */

import { HTTP_STATUS, UPSTREAM } from './constants.js';
import {
  AuthenticationFailedError,
  MfaRequiredError,
  UpstreamAuthExpiredError,
  UpstreamOperationError,
  UpstreamTransportError,
} from './errors.js';
import { HttpClient, InterceptorChain, isSuccessStatus } from './interceptors.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { Credentials } from './credentials.js';
import { selectOneTimeCode } from './totp.js';
import { isRecord } from './validation-utils.js';

export type GraphQLData = Record<string, unknown>;
export type GraphQLVariables = Record<string, unknown>;

export interface SessionClientOptions {
  baseUrl: string;
  credentials: Credentials;
  logger?: Logger;
  metrics?: MetricsCollector;
  timeoutMs?: number;
  /** Clock used for one-time code derivation */
  now?: () => number;
}

type SessionState =
  | { kind: 'unauthenticated' }
  | { kind: 'authenticated'; token: string };

interface LoginRequest {
  username: string;
  password: string;
  supports_mfa: boolean;
  trusted_device: boolean;
  totp?: string;
}

const MAX_ERROR_BODY_LENGTH = 500;

function describeBody(body: unknown): string {
  if (body === undefined) return '';
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > MAX_ERROR_BODY_LENGTH ? `${text.substring(0, MAX_ERROR_BODY_LENGTH)}...` : text;
}

export class SessionClient {
  private state: SessionState = { kind: 'unauthenticated' };
  private http: HttpClient;
  private credentials: Credentials;
  private logger: Logger;
  private metrics?: MetricsCollector;
  private now: () => number;

  constructor(options: SessionClientOptions) {
    this.credentials = options.credentials;
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;

    const interceptors = new InterceptorChain({
      defaultHeaders: {
        'Accept': 'application/json',
        'Client-Platform': UPSTREAM.CLIENT_PLATFORM,
        'User-Agent': UPSTREAM.USER_AGENT,
      },
      logger: this.logger,
      metrics: options.metrics,
    });
    this.http = new HttpClient(options.baseUrl, interceptors, options.timeoutMs);
  }

  isAuthenticated(): boolean {
    return this.state.kind === 'authenticated';
  }

  /**
   * Log in upstream and cache the session token
   *
   * A one-time code derived from mfaSecretKey takes precedence over a raw mfaCode.
   */
  async authenticate(): Promise<string> {
    const { email, password, mfaCode, mfaSecretKey } = this.credentials;
    const totp = selectOneTimeCode(mfaSecretKey, mfaCode, this.now());

    const body: LoginRequest = {
      username: email,
      password,
      supports_mfa: true,
      trusted_device: false,
    };
    if (totp) {
      body.totp = totp;
    }

    this.logger.debug('Upstream login', {
      email,
      mfa: mfaSecretKey ? 'secret-key' : mfaCode ? 'code' : 'none',
    });

    const response = await this.http.request('POST', UPSTREAM.LOGIN_PATH, {
      body,
      operation: 'login',
    });

    if (response.status === HTTP_STATUS.FORBIDDEN && !totp) {
      this.metrics?.recordLogin('mfa_required');
      throw new MfaRequiredError();
    }

    if (!isSuccessStatus(response.status)) {
      this.metrics?.recordLogin('failed');
      throw new AuthenticationFailedError(
        `Login failed: ${response.status} - ${describeBody(response.body)}`,
        response.status,
        response.body
      );
    }

    const token = isRecord(response.body) ? response.body.token : undefined;
    if (typeof token !== 'string' || token === '') {
      this.metrics?.recordLogin('failed');
      throw new AuthenticationFailedError('Invalid login response: no token received', response.status);
    }

    this.metrics?.recordLogin('success');
    this.state = { kind: 'authenticated', token };
    this.logger.debug('Upstream login succeeded');
    return token;
  }

  /**
   * Execute a GraphQL operation against the current session
   *
   * On a 401 the token is discarded, a fresh login is made and the identical
   * request is replayed once. A second 401 is fatal for this call.
   */
  async execute(
    operationName: string,
    document: string,
    variables: GraphQLVariables = {}
  ): Promise<GraphQLData> {
    let reauthAttempts = 0;

    for (;;) {
      const token = await this.ensureToken();
      const response = await this.http.request('POST', UPSTREAM.GRAPHQL_PATH, {
        body: { operationName, query: document, variables },
        headers: { 'Authorization': `${UPSTREAM.TOKEN_SCHEME} ${token}` },
        operation: operationName,
      });

      if (response.status === HTTP_STATUS.UNAUTHORIZED) {
        this.state = { kind: 'unauthenticated' };
        if (reauthAttempts >= UPSTREAM.MAX_REAUTH_ATTEMPTS) {
          throw new UpstreamAuthExpiredError(operationName);
        }
        reauthAttempts++;
        this.logger.info('Upstream token rejected, re-authenticating', { operationName });
        continue;
      }

      if (!isSuccessStatus(response.status)) {
        throw new UpstreamTransportError(
          `GraphQL request failed: ${response.status} - ${describeBody(response.body)}`,
          response.status,
          response.body
        );
      }

      return this.unwrap(operationName, response.body);
    }
  }

  private async ensureToken(): Promise<string> {
    if (this.state.kind === 'authenticated') {
      return this.state.token;
    }
    return this.authenticate();
  }

  private unwrap(operationName: string, body: unknown): GraphQLData {
    if (!isRecord(body)) {
      throw new UpstreamOperationError('GraphQL response was not a JSON object', operationName);
    }

    const errors = Array.isArray(body.errors) ? body.errors : [];
    if (errors.length > 0) {
      const messages = errors.map(e => isRecord(e) && typeof e.message === 'string' ? e.message : JSON.stringify(e));
      throw new UpstreamOperationError(`GraphQL error: ${messages.join(', ')}`, operationName, { messages });
    }

    if (!isRecord(body.data)) {
      throw new UpstreamOperationError('GraphQL response missing data', operationName);
    }

    return body.data;
  }
}
