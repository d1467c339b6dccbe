import { HarnessError } from '../../harness/utils/errors';

export type ScopeProbeFailure = 'transport' | 'status' | 'cancelled';

export default class ScopeProbeError extends HarnessError {
  endpoint: string;
  reason: ScopeProbeFailure;
  status?: number;

  constructor(endpoint: string, reason: ScopeProbeFailure, detail: string, status?: number) {
    super();
    this.name = 'scope_probe_failed';
    this.message = `Unable to check credential access against ${endpoint}: ${detail}`;
    this.endpoint = endpoint;
    this.reason = reason;
    this.status = status;
  }
}
