import { Job, Scenario } from './scenario.spec';

/**
 * Holds what a run actually did. This is the copy that gets persisted or compared
 * against a scenario's expectations, so it must never contain resolved secrets.
 */
export default class RunRecorder {
  actual: Scenario;

  constructor(job?: Job) {
    this.actual = new Scenario();
    if (job) {
      this.actual.input.job = job;
    }
  }
}
