import { instanceToPlain, plainToInstance } from 'class-transformer';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import path from 'path';
import type RunParams from '../run-params';
import { HarnessError, ValidationErrors } from '../utils/errors';
import { validateInstance } from '../utils/validation';
import { Scenario } from './scenario.spec';

export default class ScenarioUtils {
  static fromPlain(plain: unknown, file?: { path: string; contents: string }): Scenario {
    const scenario_name = file ? path.basename(file.path) : '<scenario>';
    if (!(plain instanceof Object) || Array.isArray(plain)) {
      throw new HarnessError(`${scenario_name} must be a YAML mapping with input and output keys`);
    }

    const scenario = plainToInstance(Scenario, plain, { exposeUnsetFields: false });
    const errors = validateInstance(scenario_name, scenario);
    if (errors.length > 0) {
      throw new ValidationErrors(errors, file);
    }
    return scenario;
  }

  static toPlain(scenario: Scenario): Record<string, unknown> {
    return instanceToPlain(scenario, { exposeUnsetFields: false });
  }

  static async loadScenario(scenario_path: string): Promise<Scenario> {
    if (!(await fs.pathExists(scenario_path))) {
      throw new HarnessError(`Could not find a scenario file at ${scenario_path}`);
    }
    const contents = await fs.readFile(scenario_path, 'utf-8');
    return this.fromPlain(yaml.load(contents), { path: scenario_path, contents });
  }

  static async saveScenario(scenario_path: string, scenario: Scenario): Promise<void> {
    await fs.outputFile(scenario_path, yaml.dump(this.toPlain(scenario), { noRefs: true, skipInvalid: true }));
  }

  static toRunParams(scenario: Scenario, output: string): RunParams {
    return {
      job: scenario.input.job,
      creds: scenario.input.credentials.map(credential => ({ ...credential })),
      output,
    };
  }
}
