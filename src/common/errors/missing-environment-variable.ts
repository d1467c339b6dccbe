import { HarnessError } from '../../harness/utils/errors';

export default class MissingEnvironmentVariableError extends HarnessError {
  variable: string;

  constructor(variable: string, credential_key: string) {
    super();
    this.name = 'missing_environment_variable';
    this.message = `Credential field "${credential_key}" references $${variable}, but ${variable} is not set in the environment.`;
    this.variable = variable;
  }
}
