import 'reflect-metadata';

export { default as HarnessConfig } from './app-config/config';
export { default as InvalidConfigOption } from './common/errors/invalid-config-option';
export { default as MalformedOutputError } from './common/errors/malformed-output';
export { default as MissingEnvironmentVariableError } from './common/errors/missing-environment-variable';
export { default as ScopeProbeError } from './common/errors/scope-probe';
export type { ScopeProbeFailure } from './common/errors/scope-probe';
export { default as WriteAccessError } from './common/errors/write-access';
export type { Dictionary } from './common/utils/dictionary';
export type { default as Credential, CredentialValue } from './harness/credential/credential.entity';
export { default as CredentialUtils, DEFAULT_API_ENDPOINT, WRITE_SCOPES } from './harness/credential/credential.utils';
export type { ProbeContext } from './harness/credential/credential.utils';
export { default as EnvironmentUtils } from './harness/environment/environment.utils';
export type { ExpandOptions } from './harness/environment/environment.utils';
export { default as IgnoreConditionUtils } from './harness/ignore/ignore.utils';
export type { IgnoreConditionResult } from './harness/ignore/ignore.utils';
export type { default as RunParams } from './harness/run-params';
export { default as RunUtils } from './harness/run.utils';
export type { PreflightOptions } from './harness/run.utils';
export { default as RunRecorder } from './harness/scenario/run-recorder';
export * from './harness/scenario/scenario.spec';
export { default as ScenarioUtils } from './harness/scenario/scenario.utils';
export * from './harness/utils/errors';
