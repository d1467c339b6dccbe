import { HarnessError } from '../../harness/utils/errors';

export default class InvalidConfigOption extends HarnessError {
  constructor(option: string, reason?: string) {
    super();
    this.name = 'invalid_config_option';
    this.message = reason
      ? `The CLI config option, "${option}", ${reason}.`
      : `The CLI config option, "${option}", is not a valid option.`;
  }
}
