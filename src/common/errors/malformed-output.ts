import { ValidationError, ValidationErrors } from '../../harness/utils/errors';

export default class MalformedOutputError extends ValidationErrors {
  output_index: number;

  constructor(output_index: number, errors: ValidationError[]) {
    super(errors);
    this.name = 'malformed_output';
    this.message = `Output ${output_index} is not a valid create_pull_request payload:\n${errors.map(error => `  ${error.path}: ${error.message}`).join('\n')}`;
    this.output_index = output_index;
  }
}
