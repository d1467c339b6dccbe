import { HarnessError } from '../../harness/utils/errors';

export default class WriteAccessError extends HarnessError {
  scopes: string[];

  constructor(scopes: string[]) {
    super();
    this.name = 'write_access';
    this.message = `For security, credentials used by the harness are not allowed to have write access. Granted write scopes: ${scopes.join(', ')}`;
    this.scopes = scopes;
  }
}
