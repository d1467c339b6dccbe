import chalk from 'chalk';
import { expect } from 'chai';
import fs from 'fs-extra';
import nock from 'nock';
import sinon from 'sinon';
import AppService from '../src/app-config/service';
import Ignore from '../src/commands/ignore';
import Preflight from '../src/commands/preflight';
import WriteAccessError from '../src/common/errors/write-access';
import { makeTmpDir, MOCK_API_ENDPOINT, writeScenarioFile } from './utils/mocks';

const runCommand = async (run: () => Promise<unknown>): Promise<unknown> => {
  try {
    await run();
  } catch (err: unknown) {
    return err;
  }
  throw new Error('Expected the command to fail');
};

describe('command errors', () => {
  let tmp_dir: string;
  let error_spy: sinon.SinonSpy;

  beforeEach(() => {
    tmp_dir = makeTmpDir();
    error_spy = sinon.fake();
    sinon.replace(console, 'error', error_spy);
    sinon.replace(AppService, 'create', () => new AppService('', '0.0.0-test'));
  });

  afterEach(() => {
    process.exitCode = undefined;
    fs.removeSync(tmp_dir);
  });

  it('prints the scenario lines around a validation error', async () => {
    const scenario_path = writeScenarioFile(tmp_dir, 'invalid.yml', [
      'input:',
      '  job:',
      '    package-manager: npm_and_yarn',
      '  credentials: []',
      'output:',
      '  - type: create_pull_request',
      '    expect:',
      '      data: hello',
      '',
    ].join('\n'));

    const err = await runCommand(() => Ignore.run([scenario_path]));

    expect(err).to.have.property('name', `ValidationErrors\nfile: ${scenario_path}:8:12`);
    expect(process.exitCode).to.equal(1);
    expect(error_spy.callCount).to.equal(2);
    expect(error_spy.firstCall.args[0]).to.equal(chalk.red(`ValidationErrors\nfile: ${scenario_path}:8:12`));
    expect(error_spy.secondCall.args[0].split('\n')).to.deep.equal([
      '  ' + chalk.gray('5 | ') + chalk.cyan('output:'),
      '  ' + chalk.gray('6 | ') + chalk.cyan('  - type: create_pull_request'),
      '  ' + chalk.gray('7 | ') + chalk.cyan('    expect:'),
      chalk.red('›') + ' ' + chalk.gray('8 | ') + chalk.cyan('      data: hello'),
      chalk.gray(`${' '.repeat(3)} | `) + ' '.repeat(11) + chalk.red('﹋﹋﹋') + ' ' + chalk.red('data must be an object'),
      '  ' + chalk.gray('9 | ') + chalk.cyan(''),
    ]);
  });

  it('lists the invalid paths of a malformed pull request output', async () => {
    const scenario_path = writeScenarioFile(tmp_dir, 'malformed.yml', [
      'input:',
      '  job: {}',
      '  credentials: []',
      'output:',
      '  - type: create_pull_request',
      '    expect:',
      '      data:',
      '        dependencies:',
      '          - version: 1.0.0',
      '',
    ].join('\n'));
    const log_spy = sinon.fake();
    sinon.replace(Ignore.prototype, 'log', log_spy);

    const err = await runCommand(() => Ignore.run([scenario_path]));

    expect(err).to.have.property('name', 'malformed_output');
    expect(err).to.have.property('output_index', 0);
    expect(error_spy.callCount).to.equal(2);
    expect(error_spy.firstCall.args[0]).to.equal(chalk.red('malformed_output'));
    expect(error_spy.secondCall.args[0]).to.equal(chalk.red('  output.0.expect.data.dependencies.0.name: name should not be empty'));
    expect(log_spy.called).to.equal(false);
    expect(fs.readFileSync(scenario_path, 'utf-8')).to.not.contain('ignore-conditions');
  });

  it('prints other errors in red and fails the command', async () => {
    const scenario_path = writeScenarioFile(tmp_dir, 'npm.yml', [
      'input:',
      '  job: {}',
      '  credentials:',
      '    - token: ghp_fake',
      'output: []',
      '',
    ].join('\n'));
    nock(MOCK_API_ENDPOINT).get('/').reply(200, 'SUCCESS', { 'X-OAuth-Scopes': 'repo' });

    const err = await runCommand(() => Preflight.run([scenario_path, '--api-endpoint', MOCK_API_ENDPOINT]));

    expect(err).to.be.instanceOf(WriteAccessError);
    expect(process.exitCode).to.equal(1);
    expect(error_spy.calledOnce).to.equal(true);
    expect(error_spy.firstCall.args[0]).to.equal(chalk.red('For security, credentials used by the harness are not allowed to have write access. Granted write scopes: repo'));
  });
});
