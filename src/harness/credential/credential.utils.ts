import axios, { AxiosInstance, AxiosResponse } from 'axios';
import ScopeProbeError from '../../common/errors/scope-probe';
import WriteAccessError from '../../common/errors/write-access';
import type { Job } from '../scenario/scenario.spec';
import type Credential from './credential.entity';

export const DEFAULT_API_ENDPOINT = 'https://api.github.com';

export const SCOPES_HEADER = 'x-oauth-scopes';

export const WRITE_SCOPES: ReadonlySet<string> = new Set([
  'repo',
  'public_repo',
  'delete_repo',
  'workflow',
  'write:packages',
  'delete:packages',
  'admin:org',
  'write:org',
  'admin:repo_hook',
  'write:repo_hook',
  'admin:org_hook',
  'admin:public_key',
  'write:public_key',
  'admin:gpg_key',
  'write:gpg_key',
  'write:discussion',
  'admin:enterprise',
]);

export interface ProbeContext {
  api_endpoint?: string;
  // milliseconds; 0 disables the timeout
  timeout?: number;
  signal?: AbortSignal;
  http?: AxiosInstance;
}

export default class CredentialUtils {
  static parseScopes(header?: string): Set<string> {
    return new Set((header || '').split(/[\s,]+/).filter(scope => scope.length > 0));
  }

  static findWriteScopes(scopes: Set<string>): string[] {
    return [...scopes].filter(scope => WRITE_SCOPES.has(scope));
  }

  static getSecrets(credential: Credential): string[] {
    const secrets: string[] = [];
    for (const key of ['token', 'password']) {
      const value = credential[key];
      if (typeof value === 'string' && value.length > 0) {
        secrets.push(value);
      }
    }
    return secrets;
  }

  static resolveApiEndpoint(job: Job | undefined, default_endpoint: string): string {
    const api_endpoint = job?.source?.apiEndpoint;
    return api_endpoint ? api_endpoint : default_endpoint;
  }

  /**
   * Probes the API once per credential secret and rejects as soon as one of them has been
   * granted a write-capable OAuth scope. Probe failures reject with a ScopeProbeError: a
   * credential that could not be checked is never treated as read-only.
   */
  static async checkCredAccess(ctx: ProbeContext, job: Job | undefined, credentials: Credential[]): Promise<void> {
    const api_endpoint = this.resolveApiEndpoint(job, ctx.api_endpoint || DEFAULT_API_ENDPOINT);
    const http = ctx.http || axios.create();

    for (const credential of credentials) {
      for (const secret of this.getSecrets(credential)) {
        const response = await this.probe(http, api_endpoint, secret, ctx);
        const write_scopes = this.findWriteScopes(this.parseScopes(this.getScopesHeader(response)));
        if (write_scopes.length > 0) {
          throw new WriteAccessError(write_scopes);
        }
      }
    }
  }

  private static getScopesHeader(response: AxiosResponse): string {
    const header: unknown = response.headers[SCOPES_HEADER];
    if (typeof header === 'string') {
      return header;
    }
    if (Array.isArray(header)) {
      return header.join(',');
    }
    return '';
  }

  private static async probe(http: AxiosInstance, api_endpoint: string, secret: string, ctx: ProbeContext): Promise<AxiosResponse> {
    if (ctx.signal?.aborted) {
      throw new ScopeProbeError(api_endpoint, 'cancelled', 'the check was cancelled');
    }

    try {
      return await http.get(api_endpoint, {
        headers: {
          Authorization: `Bearer ${secret}`,
          Accept: 'application/vnd.github+json',
        },
        timeout: ctx.timeout,
        signal: ctx.signal,
      });
    } catch (err: unknown) {
      if (axios.isCancel(err) || ctx.signal?.aborted) {
        throw new ScopeProbeError(api_endpoint, 'cancelled', 'the check was cancelled');
      }
      if (axios.isAxiosError(err) && err.response) {
        throw new ScopeProbeError(api_endpoint, 'status', `probe returned ${err.response.status}`, err.response.status);
      }
      const detail = err instanceof Error && err.message ? err.message : 'request failed';
      throw new ScopeProbeError(api_endpoint, 'transport', detail);
    }
  }
}
