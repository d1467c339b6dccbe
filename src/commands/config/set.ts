import { Args } from '@oclif/core';
import BaseCommand from '../../base-command';

export default class ConfigSet extends BaseCommand {
  static description = 'Set a new value for a CLI configuration option';

  static examples = [
    'update-harness config:set api_endpoint https://ghe.example.com/api/v3',
    'update-harness config:set probe_timeout 5000',
    'update-harness config:set log_level debug',
  ];

  static args = {
    option: Args.string({
      required: true,
      description: 'Name of a config option',
    }),
    value: Args.string({
      required: true,
      description: 'New value to assign to a config option',
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigSet);

    this.app.config.set(args.option, args.value);
    this.app.saveConfig();
    this.log(`Successfully updated ${args.option} to ${args.value}`);
  }
}
