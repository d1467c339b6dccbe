export type CredentialValue = string | boolean;

/**
 * A registry or source credential handed to the update job. Only the listed fields are
 * interpreted here; provider-specific keys (e.g. `replaces-base`) pass through untouched.
 */
export default interface Credential {
  type?: string;
  host?: string;
  url?: string;
  registry?: string;
  username?: string;
  password?: string;
  token?: string;
  [key: string]: CredentialValue | undefined;
}
