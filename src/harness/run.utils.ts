import CredentialUtils, { ProbeContext } from './credential/credential.utils';
import EnvironmentUtils, { ExpandOptions } from './environment/environment.utils';
import type RunParams from './run-params';
import RunRecorder from './scenario/run-recorder';

export interface PreflightOptions extends ProbeContext, ExpandOptions { }

export default class RunUtils {
  /**
   * Gate run before an update job starts: resolves secrets into `params.creds`, then checks
   * the resolved credentials for write access. The returned recorder holds the credentials
   * as written, ready to be persisted with the run.
   */
  static async preflight(params: RunParams, options: PreflightOptions = {}): Promise<RunRecorder> {
    const recorder = new RunRecorder(params.job);
    EnvironmentUtils.expandEnvironmentVariables(recorder, params, options);
    await CredentialUtils.checkCredAccess(options, params.job, params.creds);
    return recorder;
  }
}
