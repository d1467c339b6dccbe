import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import BaseCommand from '../base-command';
import CredentialUtils from '../harness/credential/credential.utils';
import RunUtils from '../harness/run.utils';
import ScenarioUtils from '../harness/scenario/scenario.utils';

export default class Preflight extends BaseCommand {
  static description = 'Resolve the secrets of a scenario\'s credentials and verify none of them can write to the provider';

  static examples = [
    'update-harness preflight ./scenarios/npm-update.yml',
    'update-harness preflight --strict-env -o ./out/npm-update.yml ./scenarios/npm-update.yml',
    'HARNESS_API_ENDPOINT=https://ghe.example.com/api/v3 update-harness preflight ./scenarios/npm-update.yml',
  ];

  static flags = {
    'api-endpoint': Flags.string({
      description: 'API endpoint to probe when the job does not set source.api-endpoint',
      env: 'HARNESS_API_ENDPOINT',
    }),
    timeout: Flags.integer({
      description: 'Probe timeout in milliseconds',
      min: 0,
    }),
    'strict-env': Flags.boolean({
      description: 'Fail when a credential references an unset environment variable',
      default: false,
    }),
    output: Flags.string({
      char: 'o',
      description: 'Write the recorded scenario (credential placeholders intact) to this file',
    }),
  };

  static args = {
    scenario_file: Args.string({
      description: 'Scenario file holding the job and its credentials',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Preflight);

    const scenario = await ScenarioUtils.loadScenario(path.resolve(args.scenario_file));
    const params = ScenarioUtils.toRunParams(scenario, flags.output || args.scenario_file);
    const default_endpoint = flags['api-endpoint'] || this.app.config.api_endpoint;
    this.logDebug(`Probing ${CredentialUtils.resolveApiEndpoint(params.job, default_endpoint)} for ${params.creds.length} credential(s)`);

    const controller = new AbortController();
    const abort = () => controller.abort();
    process.once('SIGINT', abort);
    try {
      const recorder = await RunUtils.preflight(params, {
        api_endpoint: default_endpoint,
        timeout: flags.timeout ?? this.app.config.probe_timeout,
        signal: controller.signal,
        http: this.app.http,
        strict: flags['strict-env'],
      });

      // Counted after expansion: secrets that resolved to '' are never probed
      const probe_count = params.creds.reduce((count, credential) => count + CredentialUtils.getSecrets(credential).length, 0);
      this.log(chalk.green(`✓ ${params.creds.length} credential(s) checked, ${probe_count} secret(s) verified read-only`));

      if (flags.output) {
        await ScenarioUtils.saveScenario(path.resolve(flags.output), recorder.actual);
        this.log(`Recorded scenario written to ${flags.output}`);
      }
    } finally {
      process.removeListener('SIGINT', abort);
    }
  }
}
