import type Credential from './credential/credential.entity';
import type { Job } from './scenario/scenario.spec';

export default interface RunParams {
  job?: Job;
  creds: Credential[];
  // Output file of the run. Also the source recorded on generated ignore conditions
  output: string;
}
