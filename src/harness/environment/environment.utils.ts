import MissingEnvironmentVariableError from '../../common/errors/missing-environment-variable';
import type Credential from '../credential/credential.entity';
import type { CredentialValue } from '../credential/credential.entity';
import type RunParams from '../run-params';
import type RunRecorder from '../scenario/run-recorder';

// Whole-value references only: `$NAME` or `${NAME}`
const PLACEHOLDER_REGEX = /^\$(?:([A-Za-z_]\w*)|\{([A-Za-z_]\w*)\})$/;

export interface ExpandOptions {
  // Fail on unset variables instead of substituting an empty string
  strict?: boolean;
  env?: NodeJS.ProcessEnv;
}

export default class EnvironmentUtils {
  static getPlaceholder(value: CredentialValue | undefined): string | undefined {
    if (typeof value !== 'string') {
      return;
    }
    const match = PLACEHOLDER_REGEX.exec(value);
    return match ? match[1] || match[2] : undefined;
  }

  static expandValue(key: string, value: CredentialValue | undefined, options: ExpandOptions = {}): CredentialValue | undefined {
    const variable = this.getPlaceholder(value);
    if (!variable) {
      return value;
    }

    const env = options.env || process.env;
    const resolved = env[variable];
    if (resolved === undefined && options.strict) {
      throw new MissingEnvironmentVariableError(variable, key);
    }
    return resolved ?? '';
  }

  static expandCredential(credential: Credential, options: ExpandOptions = {}): Credential {
    const expanded: Credential = {};
    for (const [key, value] of Object.entries(credential)) {
      expanded[key] = this.expandValue(key, value, options);
    }
    return expanded;
  }

  /**
   * Records the credentials exactly as written into the recorder, then swaps `params.creds`
   * for freshly built credentials with every placeholder resolved from the environment.
   */
  static expandEnvironmentVariables(recorder: RunRecorder, params: RunParams, options: ExpandOptions = {}): void {
    // Expand first so a strict failure leaves both params and the recorder untouched
    const materialized = params.creds.map(credential => this.expandCredential(credential, options));

    recorder.actual.input.credentials = params.creds.map(credential => ({ ...credential }));
    params.creds = materialized;
  }
}
