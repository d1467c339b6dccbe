import BaseCommand from '../../base-command';
import Table from '../../base-table';

export default class ConfigView extends BaseCommand {
  static description = 'View all the CLI configuration settings';
  static aliases = ['config'];

  async run(): Promise<void> {
    const table = new Table({ head: ['Name', 'Value'] });

    for (const [name, value] of Object.entries(this.app.config.toJSON())) {
      table.push([name, `${value}`]);
    }

    this.log(table.toString());
  }
}
