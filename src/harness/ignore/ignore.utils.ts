import { plainToInstance } from 'class-transformer';
import MalformedOutputError from '../../common/errors/malformed-output';
import type RunParams from '../run-params';
import { Condition, CREATE_PULL_REQUEST, CreatePullRequest, Dependency, Scenario } from '../scenario/scenario.spec';
import { ValidationError } from '../utils/errors';
import { validateInstance } from '../utils/validation';

export interface IgnoreConditionResult {
  added: Condition[];
  // Dependencies that were neither removed nor versioned, so nothing could be suppressed
  skipped: Dependency[];
}

export default class IgnoreConditionUtils {
  static buildCondition(dependency_name: string, source: string, version: string): Condition {
    const condition = new Condition();
    condition.dependencyName = dependency_name;
    condition.source = source;
    condition.versionRequirement = `>${version}`;
    return condition;
  }

  static parsePullRequest(scenario_name: string, output_index: number, data: unknown): CreatePullRequest {
    const path = `output.${output_index}.expect.data`;
    if (!(data instanceof Object) || Array.isArray(data)) {
      throw new MalformedOutputError(output_index, [new ValidationError({ scenario: scenario_name, path, message: 'data must be an object' })]);
    }
    const pull_request = plainToInstance(CreatePullRequest, data, { exposeUnsetFields: false });
    const errors = validateInstance(scenario_name, pull_request, path);
    if (errors.length > 0) {
      throw new MalformedOutputError(output_index, errors);
    }
    return pull_request;
  }

  /**
   * Appends an ignore condition for every dependency a create_pull_request output updated,
   * so the next run does not propose the same update. Removed dependencies are left free to
   * be re-evaluated. Conditions are appended, never deduplicated.
   */
  static generateIgnoreConditions(params: RunParams, scenario: Scenario): IgnoreConditionResult {
    const pull_requests: CreatePullRequest[] = [];
    for (const [index, output] of scenario.output.entries()) {
      if (output.type !== CREATE_PULL_REQUEST) {
        continue;
      }
      pull_requests.push(this.parsePullRequest(params.output, index, output.expect.data));
    }

    const result: IgnoreConditionResult = { added: [], skipped: [] };
    for (const pull_request of pull_requests) {
      for (const dependency of pull_request.dependencies) {
        if (dependency.removed) {
          continue;
        }
        if (!dependency.version) {
          result.skipped.push(dependency);
          continue;
        }
        result.added.push(this.buildCondition(dependency.name, params.output, dependency.version));
      }
    }

    scenario.input.job.ignoreConditions.push(...result.added);
    return result;
  }
}
