import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import BaseCommand from '../base-command';
import Table from '../base-table';
import IgnoreConditionUtils from '../harness/ignore/ignore.utils';
import ScenarioUtils from '../harness/scenario/scenario.utils';

export default class Ignore extends BaseCommand {
  static description = 'Add ignore conditions for every dependency a run updated so the next run does not propose it again';

  static examples = [
    'update-harness ignore ./scenarios/npm-update.yml',
    'update-harness ignore -o ./scenarios/npm-update-next.yml ./scenarios/npm-update.yml',
    'update-harness ignore --dry-run ./scenarios/npm-update.yml',
  ];

  static flags = {
    output: Flags.string({
      char: 'o',
      description: 'File the updated scenario is written to, recorded as the source of each condition. Defaults to SCENARIO_FILE',
    }),
    'dry-run': Flags.boolean({
      description: 'Print the conditions without writing the scenario',
      default: false,
    }),
  };

  static args = {
    scenario_file: Args.string({
      description: 'Scenario file holding the outputs of a completed run',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Ignore);

    const scenario = await ScenarioUtils.loadScenario(path.resolve(args.scenario_file));
    const output = flags.output || args.scenario_file;
    const result = IgnoreConditionUtils.generateIgnoreConditions(ScenarioUtils.toRunParams(scenario, output), scenario);

    for (const dependency of result.skipped) {
      this.warn(`${dependency.name} was updated without a version, no ignore condition added`);
    }

    if (result.added.length === 0) {
      this.log('No ignore conditions to add.');
      return;
    }

    const table = new Table({ head: ['Dependency', 'Source', 'Version requirement'] });
    for (const condition of result.added) {
      table.push([condition.dependencyName, condition.source || '', condition.versionRequirement || '']);
    }
    this.log(table.toString());

    if (flags['dry-run']) {
      return;
    }

    await ScenarioUtils.saveScenario(path.resolve(output), scenario);
    this.log(chalk.green(`Added ${result.added.length} ignore condition(s) to ${output}`));
  }
}
